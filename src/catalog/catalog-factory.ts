import * as path from 'path';
import { CatalogAdapter } from './types';
import { HttpCatalogAdapter } from './http-catalog';
import { StaticCatalogAdapter } from './static-catalog';
import { logger } from '../observability/logger';

/**
 * REST catalog when CATALOG_API_URL is set, otherwise the YAML catalog
 * shipped in the knowledge directory.
 */
export function createCatalog(config: { baseUrl: string; timeoutMs: number; maxItems: number }, knowledgeDir: string): CatalogAdapter {
  if (config.baseUrl) {
    logger.info({ baseUrl: config.baseUrl }, 'HTTP catalog adapter initialized');
    return new HttpCatalogAdapter(config);
  }
  logger.warn('No CATALOG_API_URL set; using static catalog');
  return StaticCatalogAdapter.fromFile(path.join(knowledgeDir, 'catalog.yaml'), config.maxItems);
}

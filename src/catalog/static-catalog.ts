import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { CatalogAdapter, CatalogProduct, CatalogResult } from './types';
import { matchProducts } from './catalog-matcher';
import { AdapterUnavailableError } from '../orchestrator/errors';
import { logger } from '../observability/logger';

function isCatalogProduct(value: unknown): value is CatalogProduct {
  if (typeof value !== 'object' || value === null) return false;
  const entry = value as Record<string, unknown>;
  return (
    typeof entry.name === 'string' &&
    typeof entry.price === 'number' &&
    typeof entry.stock === 'number' &&
    typeof entry.category === 'string'
  );
}

/**
 * Product catalog read from a YAML file. Used when no catalog API is configured.
 */
export class StaticCatalogAdapter implements CatalogAdapter {
  readonly name = 'static';
  private products: CatalogProduct[];

  constructor(products: CatalogProduct[], private readonly maxItems: number) {
    this.products = products;
  }

  static fromFile(filepath: string, maxItems: number): StaticCatalogAdapter {
    const products: CatalogProduct[] = [];
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Catalog file not found; catalog is empty');
      return new StaticCatalogAdapter(products, maxItems);
    }

    const loaded = yaml.load(fs.readFileSync(filepath, 'utf-8'));
    const entries = Array.isArray(loaded) ? loaded : [];
    for (const entry of entries) {
      if (isCatalogProduct(entry)) {
        products.push(entry);
      } else {
        logger.warn({ filepath, entry }, 'Skipping malformed catalog entry');
      }
    }
    logger.info({ filepath: path.basename(filepath), productCount: products.length }, 'Static catalog loaded');
    return new StaticCatalogAdapter(products, maxItems);
  }

  async lookup(query: string): Promise<CatalogResult> {
    if (this.products.length === 0) {
      throw new AdapterUnavailableError('catalog', 'Static catalog has no products loaded');
    }
    return matchProducts(this.products, query, this.maxItems);
  }
}

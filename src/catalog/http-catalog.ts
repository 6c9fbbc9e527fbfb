import { CatalogAdapter, CatalogProduct, CatalogResult } from './types';
import { matchProducts } from './catalog-matcher';
import { AdapterUnavailableError } from '../orchestrator/errors';
import { logger } from '../observability/logger';

export interface HttpCatalogConfig {
  baseUrl: string;
  timeoutMs: number;
  maxItems: number;
}

/**
 * Map one product of the REST catalog to our shape.
 *
 * Expected response of GET {baseUrl}/products:
 * [
 *   {
 *     "id": 1,
 *     "title": "Canvas Backpack",
 *     "price": 29.99,
 *     "category": "bags",
 *     "description": "...",
 *     "stock": 3
 *   }
 * ]
 * `name` is accepted in place of `title`; a missing stock counts as 0.
 */
function toProduct(raw: unknown): CatalogProduct | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const product = raw as Record<string, unknown>;
  const name = typeof product.title === 'string' ? product.title : product.name;
  const price = typeof product.price === 'number' ? product.price : Number(product.price);
  if (typeof name !== 'string' || !Number.isFinite(price)) return null;

  return {
    name,
    price,
    stock: typeof product.stock === 'number' ? product.stock : 0,
    category: typeof product.category === 'string' ? product.category : '',
    description: typeof product.description === 'string' ? product.description : undefined,
  };
}

/**
 * Catalog adapter for a REST product API. The API has no search, so
 * matching happens client-side over the product list.
 */
export class HttpCatalogAdapter implements CatalogAdapter {
  readonly name = 'http';
  private log = logger.child({ component: 'http-catalog' });

  constructor(private readonly config: HttpCatalogConfig) {}

  async lookup(query: string): Promise<CatalogResult> {
    const products = await this.fetchProducts();
    return matchProducts(products, query, this.config.maxItems);
  }

  private async fetchProducts(): Promise<CatalogProduct[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/products`;
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (err) {
      this.log.error({ err, url }, 'Catalog request failed');
      throw new AdapterUnavailableError('catalog', 'Catalog service is unreachable', { cause: err });
    }

    if (!response.ok) {
      this.log.error({ status: response.status, url }, 'Catalog API error');
      throw new AdapterUnavailableError('catalog', `Catalog service responded with status ${response.status}`);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new AdapterUnavailableError('catalog', 'Catalog service returned invalid JSON', { cause: err });
    }
    if (!Array.isArray(data)) {
      throw new AdapterUnavailableError('catalog', 'Catalog service returned an unexpected payload');
    }

    const products: CatalogProduct[] = [];
    for (const raw of data) {
      const product = toProduct(raw);
      if (product) products.push(product);
    }
    return products;
  }
}

import * as path from 'path';
import { matchProducts, tokenize } from '../../src/catalog/catalog-matcher';
import { StaticCatalogAdapter } from '../../src/catalog/static-catalog';
import { HttpCatalogAdapter } from '../../src/catalog/http-catalog';
import { CatalogProduct } from '../../src/catalog/types';
import { AdapterUnavailableError } from '../../src/orchestrator/errors';

const CATALOG_FILE = path.resolve(__dirname, '../../knowledge/catalog.yaml');

const PRODUCTS: CatalogProduct[] = [
  { name: 'Canvas Backpack', category: 'bags', price: 29.99, stock: 3, description: 'Canvas backpack with laptop sleeve' },
  { name: 'Leather Tote', category: 'bags', price: 54.5, stock: 0, description: 'Leather tote bag' },
  { name: 'Trail Cap', category: 'clothing', price: 15.25, stock: 7, description: 'Lightweight cap for hiking' },
  { name: 'Wool Socks', category: 'clothing', price: 9.99, stock: 30, description: 'Merino wool hiking socks' },
];

describe('catalog matcher', () => {
  it('should tokenize to lowercase words', () => {
    expect(tokenize('Do you have BACKPACKS?')).toEqual(['do', 'you', 'have', 'backpacks']);
  });

  it('should match plural queries against singular names', () => {
    expect(matchProducts(PRODUCTS, 'Do you have backpacks?', 5)).toEqual({
      found: true,
      items: [{ name: 'Canvas Backpack', price: 29.99, stock: 3 }],
    });
  });

  it('should rank products by matched terms and cap the list', () => {
    const result = matchProducts(PRODUCTS, 'hiking socks', 5);
    expect(result.items.map((i) => i.name)).toEqual(['Wool Socks', 'Trail Cap']);

    expect(matchProducts(PRODUCTS, 'hiking socks', 1).items.map((i) => i.name)).toEqual(['Wool Socks']);
  });

  it('should match a category name', () => {
    expect(matchProducts(PRODUCTS, 'bags', 5).items.map((i) => i.name)).toEqual(['Canvas Backpack', 'Leather Tote']);
  });

  it('should ask which category when the question is about categories', () => {
    expect(matchProducts(PRODUCTS, 'What categories do you have?', 5)).toEqual({
      found: false,
      items: [],
      needsFollowUp: true,
      followUpPrompt: 'We carry these categories: bags, clothing. Which one are you interested in?',
    });
  });

  it('should match whole words only', () => {
    const withBottle: CatalogProduct[] = [
      ...PRODUCTS,
      { name: 'Steel Water Bottle', category: 'outdoor', price: 18, stock: 12, description: 'Insulated bottle' },
    ];

    expect(matchProducts(withBottle, 'Do you have tees?', 5)).toEqual({ found: false, items: [] });
    expect(matchProducts(withBottle, 'steel bottles', 5).items.map((i) => i.name)).toEqual(['Steel Water Bottle']);
  });

  it('should report no match', () => {
    expect(matchProducts(PRODUCTS, 'unicorn', 5)).toEqual({ found: false, items: [] });
  });
});

describe('StaticCatalogAdapter', () => {
  it('should load the shipped catalog file', async () => {
    const catalog = StaticCatalogAdapter.fromFile(CATALOG_FILE, 5);
    await expect(catalog.lookup('backpack')).resolves.toEqual({
      found: true,
      items: [{ name: 'Canvas Backpack', price: 29.99, stock: 3 }],
    });
  });

  it('should be unavailable when no products are loaded', async () => {
    const catalog = StaticCatalogAdapter.fromFile(path.join(__dirname, 'missing.yaml'), 5);
    await expect(catalog.lookup('backpack')).rejects.toBeInstanceOf(AdapterUnavailableError);
  });
});

describe('HttpCatalogAdapter', () => {
  const config = { baseUrl: 'http://catalog.test/', timeoutMs: 1000, maxItems: 5 };
  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    fetchSpy = jest.spyOn(globalThis, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should fetch the product list and match client-side', async () => {
    fetchSpy.mockResolvedValue(
      new Response(
        JSON.stringify([
          { id: 1, title: 'Canvas Backpack', price: 29.99, category: 'bags', stock: 3 },
          { id: 2, title: 'Wool Socks', price: '9.99', category: 'clothing' },
          { id: 3, price: 5 },
        ]),
        { status: 200, headers: { 'Content-Type': 'application/json' } },
      ),
    );

    const result = await new HttpCatalogAdapter(config).lookup('socks');

    expect(fetchSpy.mock.calls[0][0]).toBe('http://catalog.test/products');
    expect(result).toEqual({ found: true, items: [{ name: 'Wool Socks', price: 9.99, stock: 0 }] });
  });

  it('should be unavailable on a non-2xx status', async () => {
    fetchSpy.mockResolvedValue(new Response('oops', { status: 503 }));

    await expect(new HttpCatalogAdapter(config).lookup('socks')).rejects.toMatchObject({
      code: 'adapter_unavailable',
      adapter: 'catalog',
    });
  });

  it('should be unavailable when the request fails', async () => {
    fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

    await expect(new HttpCatalogAdapter(config).lookup('socks')).rejects.toBeInstanceOf(AdapterUnavailableError);
  });

  it('should be unavailable on a payload that is not a list', async () => {
    fetchSpy.mockResolvedValue(new Response('{"products":[]}', { status: 200 }));

    await expect(new HttpCatalogAdapter(config).lookup('socks')).rejects.toBeInstanceOf(AdapterUnavailableError);
  });
});

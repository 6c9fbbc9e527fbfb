import { CatalogProduct, CatalogResult } from './types';

const STOP_WORDS = new Set([
  'i', 'me', 'my', 'we', 'you', 'your', 'it', 'they', 'them',
  'a', 'an', 'the', 'is', 'am', 'are', 'was', 'be', 'do', 'does', 'did',
  'have', 'has', 'had', 'can', 'could', 'would', 'will',
  'to', 'of', 'in', 'for', 'on', 'with', 'at', 'by', 'from', 'about',
  'and', 'or', 'not', 'any', 'some', 'what', 'which', 'how', 'much', 'many',
  'there', 'this', 'that', 'these', 'those',
  'want', 'need', 'looking', 'please', 'sell', 'buy', 'get', 'show',
  'price', 'prices', 'cost', 'stock', 'available', 'product', 'products', 'item', 'items',
]);

const CATEGORY_WORDS = new Set(['category', 'categories', 'kind', 'kinds', 'type', 'types']);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s'-]/g, ' ')
    .split(/\s+/)
    .filter(Boolean);
}

/** Naive singular form: "backpacks" -> "backpack" */
function stem(term: string): string {
  if (term.length > 3 && term.endsWith('ies')) return `${term.slice(0, -3)}y`;
  if (term.length > 3 && term.endsWith('s') && !term.endsWith('ss')) return term.slice(0, -1);
  return term;
}

/**
 * Match free text against a product list. Products are ranked by how many
 * query words (singular form) appear as whole words in their name, category
 * or description.
 */
export function matchProducts(products: CatalogProduct[], query: string, maxItems: number): CatalogResult {
  const rawTerms = tokenize(query);
  const terms = rawTerms
    .filter((t) => !STOP_WORDS.has(t) && !CATEGORY_WORDS.has(t) && t.length > 1)
    .map(stem);

  const scored: Array<{ product: CatalogProduct; score: number }> = [];
  if (terms.length > 0) {
    for (const product of products) {
      const words = new Set(tokenize(`${product.name} ${product.category} ${product.description ?? ''}`).map(stem));
      const score = terms.filter((term) => words.has(term)).length;
      if (score > 0) scored.push({ product, score });
    }
  }

  if (scored.length > 0) {
    scored.sort((a, b) => b.score - a.score);
    return {
      found: true,
      items: scored.slice(0, maxItems).map(({ product }) => ({
        name: product.name,
        price: product.price,
        stock: product.stock,
      })),
    };
  }

  // "What categories do you have?" cannot be answered with products: ask which one
  if (rawTerms.some((t) => CATEGORY_WORDS.has(t))) {
    const categories = [...new Set(products.map((p) => p.category))].sort();
    if (categories.length > 0) {
      return {
        found: false,
        items: [],
        needsFollowUp: true,
        followUpPrompt: `We carry these categories: ${categories.join(', ')}. Which one are you interested in?`,
      };
    }
  }

  return { found: false, items: [] };
}

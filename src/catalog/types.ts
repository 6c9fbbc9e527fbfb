/** One product line as shown to the customer */
export interface CatalogItem {
  name: string;
  price: number;
  stock: number;
}

export interface CatalogResult {
  found: boolean;
  items: CatalogItem[];
  /** The adapter needs one more answer from the user before it can match */
  needsFollowUp?: boolean;
  followUpPrompt?: string;
}

/** Catalog entry as held by a backend */
export interface CatalogProduct extends CatalogItem {
  category: string;
  description?: string;
}

/**
 * Product lookup capability. Throws AdapterUnavailableError when the backend
 * cannot be reached.
 */
export interface CatalogAdapter {
  readonly name: string;
  lookup(query: string): Promise<CatalogResult>;
}

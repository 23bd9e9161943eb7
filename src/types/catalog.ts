/** Year (2000–2025) → ordered domain list, as read from the catalog file. */
export type Catalog = Map<number, string[]>;

export interface CatalogEntry {
  domain: string;
  /** Sorted, distinct years the domain appeared in a top-sites list */
  years: number[];
}

export interface CatalogFilterOptions {
  year?: number | undefined;
  quick?: boolean | undefined;
  quickLimit?: number | undefined;
}

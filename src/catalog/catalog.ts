import fs from 'fs/promises';
import { CatalogFileSchema } from '../schemas/catalog.js';
import { ScanSetupError } from '../errors.js';
import { normalizeDomain } from '../utils/domain.js';
import type { Catalog, CatalogEntry, CatalogFilterOptions } from '../types/catalog.js';

export const DEFAULT_CATALOG_PATH = new URL('../../data/catalog.json', import.meta.url);

export async function loadCatalog(path: string | URL = DEFAULT_CATALOG_PATH): Promise<Catalog> {
  let raw: string;
  try {
    raw = await fs.readFile(path, 'utf8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new ScanSetupError('CATALOG_UNREADABLE', `Cannot read catalog ${String(path)}: ${errorMessage}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ScanSetupError('CATALOG_INVALID', `Catalog ${String(path)} is not valid JSON`, { cause: error });
  }

  const parsed = CatalogFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new ScanSetupError('CATALOG_INVALID', `Catalog ${String(path)} is invalid (${detail})`, { cause: parsed.error });
  }

  return catalogFromRecord(parsed.data);
}

export function catalogFromRecord(record: Record<string, string[]>): Catalog {
  const catalog: Catalog = new Map();

  for (const [year, domains] of Object.entries(record)) {
    const cleaned = domains.map(normalizeDomain).filter((domain) => domain.length > 0);
    catalog.set(Number(year), cleaned);
  }

  return catalog;
}

/**
 * Turn the year → domains catalog into one entry per domain carrying every year it appeared.
 * `year` keeps entries whose years include it; `quick` keeps only the first `quickLimit`
 * domains of each considered year's list.
 */
export function buildCatalogEntries(catalog: Catalog, options: CatalogFilterOptions = {}): CatalogEntry[] {
  const { year, quick = false, quickLimit = 5 } = options;

  const domainYears = new Map<string, Set<number>>();
  for (const [listYear, domains] of catalog) {
    for (const domain of domains) {
      const years = domainYears.get(domain) ?? new Set<number>();
      years.add(listYear);
      domainYears.set(domain, years);
    }
  }

  const consideredYears = year !== undefined ? [year] : [...catalog.keys()].sort((a, b) => a - b);
  const selected = new Set<string>();
  for (const listYear of consideredYears) {
    const domains = catalog.get(listYear) ?? [];
    for (const domain of quick ? domains.slice(0, quickLimit) : domains) {
      selected.add(domain);
    }
  }

  return [...selected]
    .sort()
    .map((domain) => ({
      domain,
      years: [...(domainYears.get(domain) ?? [])].sort((a, b) => a - b),
    }));
}

export function catalogYears(catalog: Catalog): number[] {
  return [...catalog.keys()].sort((a, b) => a - b);
}

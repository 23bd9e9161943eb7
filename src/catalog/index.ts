export { loadCatalog, catalogFromRecord, buildCatalogEntries, catalogYears, DEFAULT_CATALOG_PATH } from './catalog.js';

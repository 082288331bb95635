export { EntityCatalog, parseCatalog, toEntityRecord, rebaseUrl } from './catalog.js';
export type { EntityRecord, CatalogShape, CatalogOptions, PropertyValue } from './catalog.js';
export { formatEntry, entrySegments, titleCase, ENTRY_NOT_FOUND } from './format.js';
export type { FormattedEntry } from './format.js';

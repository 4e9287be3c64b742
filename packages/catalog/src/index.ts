export { DEFAULT_CATALOG_PATH, DEFAULT_POPULAR_LIMIT, ResourceCatalog } from './ResourceCatalog';
export { CatalogSchema, TemplateSchema } from './schema';
export type { CatalogFile } from './schema';

export { TargetCatalog } from './target_catalog';
export type { ITargetCatalog, TargetCatalogDependencies, SignatureSource } from './target_catalog.types';

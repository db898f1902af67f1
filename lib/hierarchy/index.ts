export * from './types';
export * from './context';
export * from './resolvers';
export * from './filter-registry';
export * from './template-file';
export * from './validate-file';
export * from './template-hierarchy';
export { loadHierarchyConfig, DEFAULT_HIERARCHY_CONFIG } from '@/lib/config/hierarchy-config';
export type { HierarchyConfig } from '@/lib/config/hierarchy-config';
export { HierarchyError, isHierarchyError } from '@/lib/errors/hierarchy-error';
export type { HierarchyErrorCode } from '@/lib/errors/hierarchy-error';

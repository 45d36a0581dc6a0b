export { RoleRegistry, isTopLevelRole, isServerManageable, assertThresholdBounds } from './role_registry';
export type { IRoleRegistry, RoleRegistryDependencies } from './role_registry.types';

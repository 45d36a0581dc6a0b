export { DelegationResolver, isDelegationName, parentOf } from './delegation_resolver';
export { isGlobPattern, matchesPattern, matchesAny, patternWithin, patternsOutside } from './path_patterns';
export type {
  IDelegationResolver,
  DelegationResolverDependencies,
  DelegationAction,
  DelegationChangeResult,
  TargetsRoleSource,
} from './delegation_resolver.types';

/**
 * Policy Module
 *
 * Versioned, validated, hot-swappable authorization policy.
 */

export type {
  AlertPolicy,
  FieldMaskRule,
  IsolationPolicy,
  MaskStrategy,
  PolicySnapshot,
  ResourcePolicy,
  RolePolicy,
  RouteRule,
  ScopeSource,
  ScopeTemplate,
  ToolRule,
} from './types.js';

export { PolicyDocumentSchema, type PolicyDocument } from './policySchema.js';

export {
  compilePolicy,
  deepFreeze,
  findRouteRule,
  findToolRule,
  isCollectionOperation,
  parseScopeTemplate,
  rolePolicyFor,
  routePatternMatches,
  scopeTemplateFor,
} from './policySnapshot.js';

export {
  type PolicyFormat,
  type PolicySource,
  createFilePolicySource,
  createStaticPolicySource,
  detectFormat,
  parsePolicyDocument,
} from './policyLoader.js';

export { PolicyStore, type PolicyStoreOptions, type PolicySwapListener } from './policyStore.js';

export { watchPolicyFile, type PolicyFileWatcher, type WatchPolicyFileOptions } from './policyWatcher.js';

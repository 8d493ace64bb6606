/**
 * Access Control Gateway: credential → role → policy → scope and mask.
 *
 * @module access
 */

export type {
  AccessDecision,
  AllowedAuthorization,
  AuthorizationContext,
  AuthorizationResult,
  DecisionOutcome,
  PolicyProvider,
  ResourceResolver,
} from './types.js';
export { AccessGateway, isAllowed, isGatewayIssued, type AccessGatewayOptions } from './gateway.js';
export * from './scopeFilter.js';
export * from './fieldMask.js';
export * from './denialTracker.js';

/**
 * Lendgate – Package Entry Point
 *
 * Re-exports the access gateway, the dual-path router, the ledger and the
 * policy store, plus the HTTP app factory and the agent tool session that
 * sit on top of them.
 *
 * @module lendgate
 */

// ─── Shared Types ───
export { ERROR_CODES, ROLES, isRole } from './types/index.js';
export type {
  AuthenticatedRequest,
  DataResponse,
  DecisionRecord,
  DenialCode,
  ErrorCode,
  ErrorResponse,
  ExtractedContent,
  Operation,
  OperationKind,
  Principal,
  Role,
} from './types/index.js';

export {
  AuthenticationError,
  AuthorizationDenied,
  IsolationViolation,
  LedgerMutationDenied,
  LedgerUnavailable,
  OperationTimeout,
  PolicyLoadError,
  ScopeViolation,
} from './utils/errors.js';

// ─── Access Control ───
export * from './access/index.js';
export * from './auth/index.js';

// ─── Policy ───
export * from './policy/index.js';

// ─── Ledger ───
export * from './ledger/index.js';

// ─── Isolation ───
export * from './isolation/index.js';

// ─── Alerting & Logging ───
export * from './alerting/index.js';
export * from './logging/index.js';

// ─── Agents ───
export {
  ToolSession,
  type CredentialProvider,
  type ToolCallOptions,
  type ToolCallResult,
  type ToolContext,
  type ToolDefinition,
  type ToolOutput,
  type ToolSessionOptions,
} from './agents/toolSession.js';

// ─── HTTP ───
export { createApp, type AppDependencies } from './app.js';
export { createPlatform, recordPolicySwaps, type Platform } from './platform.js';
export { loadConfig, type AppConfig } from './config/index.js';

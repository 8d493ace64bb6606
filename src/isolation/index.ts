/**
 * Dual-path data routing for demographic data.
 *
 * This barrel is the only entry point other directories may import. The
 * partitions, the isolated pool and the credential mint stay internal.
 *
 * @module isolation
 */

export * from './types.js';
export { DualPathRouter } from './dualPathRouter.js';
export type {
  DemographicsSubmission,
  DualPathRouterOptions,
  IsolatedStorage,
  RouterCallContext,
} from './dualPathRouter.js';
export { AggregateQuerySchema, DEFAULT_FAVOURABLE_OUTCOME } from './aggregator.js';
export { DemographicDetector, loadDemographicTerms, normalizeFieldName } from './demographicDetector.js';
export { REDACTION_MARKER } from './outputScanner.js';

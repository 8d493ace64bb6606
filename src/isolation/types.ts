/**
 * Types for the isolated (demographic) data path.
 *
 * @module isolation/types
 */

export const DEMOGRAPHIC_ATTRIBUTES = ['race', 'ethnicity', 'sex', 'ageBand'] as const;

export type DemographicAttribute = (typeof DEMOGRAPHIC_ATTRIBUTES)[number];

export const COLLECTION_METHODS = ['self_reported', 'document_extraction', 'visual_observation'] as const;

export type CollectionMethod = (typeof COLLECTION_METHODS)[number];

/** Label used for a grouping attribute the applicant did not provide. */
export const NOT_PROVIDED = 'not_provided';

export interface IsolatedRecord {
  id: string;
  subjectId: string;
  race: string | null;
  ethnicity: string | null;
  sex: string | null;
  ageBand: string | null;
  collectionMethod: CollectionMethod;
  collectedAt: Date;
}

/** `id` is assigned up front when the access event must name the record before it exists. */
export type IsolatedRecordInput = Omit<IsolatedRecord, 'id' | 'collectedAt'> & { id?: string };

// ─── Aggregation ─────────────────────────────────────────────────────────────

export interface AggregateQuery {
  /** One or two attributes; each distinct label combination is a cell. */
  groupBy: DemographicAttribute[];
  /** Join general-path decision outcomes and report a per-cell ratio. */
  joinOutcomes?: boolean;
  /** Outcome counted as favourable in the ratio. Defaults to `approved`. */
  favourableOutcome?: string;
}

export interface AggregateCell {
  labels: Partial<Record<DemographicAttribute, string>>;
  count: number;
  /** Favourable share of known outcomes; null when too few are known. */
  outcomeRatio: number | null;
}

export interface Disparity {
  ratio: number;
  floor: number;
  concerning: boolean;
}

export interface AggregateStatistic {
  kind: 'statistic';
  groupLabels: DemographicAttribute[];
  values: AggregateCell[];
  sampleSize: number;
  disparity: Disparity | null;
}

/** Returned instead of numbers when any cell is below the threshold. */
export interface InsufficientSample {
  kind: 'insufficient_sample';
  minimumSampleSize: number;
}

export type AggregateOutcome = AggregateStatistic | InsufficientSample;

/** Loads general-path decision outcomes keyed by subject id. */
export type OutcomeSource = (subjectIds: string[]) => Promise<Map<string, string | null>>;

// ─── Detection ───────────────────────────────────────────────────────────────

export type DetectionMethod = 'field_name' | 'value_pattern';

export interface DemographicFinding {
  /** Dotted path of the field within the payload. */
  path: string;
  method: DetectionMethod;
  /** `other` for protected characteristics the partition does not store. */
  attribute: DemographicAttribute | 'other';
}

export interface ExclusionResult {
  cleanedPayload: Record<string, unknown>;
  excludedFields: string[];
  /** Id of the isolated record the stripped values were routed into. */
  isolatedRecordId: string | null;
}

export type OutputFindingMethod = 'statement_pattern' | 'value_term';

export interface OutputFinding {
  method: OutputFindingMethod;
  attribute: DemographicAttribute | 'other';
}

export interface ScreenedOutput {
  text: string;
  findings: OutputFinding[];
}

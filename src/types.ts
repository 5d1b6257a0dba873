// ═══════════════════════════════════════════════════════════════════════════
// RECORDS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A single cell value. `null` is the missing sentinel used when records with
 * different field sets are merged into one table.
 */
export type Scalar = string | number | boolean | null;

/**
 * One policy quote as loaded from disk or received from a caller.
 */
export type RawQuoteRecord = Readonly<Record<string, Scalar>>;

/**
 * A quote after custom derivations, category indexing and banding.
 */
export type TransformedRecord = Readonly<Record<string, Scalar>>;

/**
 * Uniform tabular view over loaded quotes.
 * `columns` is the union of every record's fields, in first-seen order.
 */
export interface Table {
  columns: string[];
  rows: RawQuoteRecord[];
}

// ═══════════════════════════════════════════════════════════════════════════
// TRANSFORMATION CONFIG
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Field name -> (raw categorical value -> integer index).
 */
export type CategoryMapping = Readonly<Record<string, Readonly<Record<string, number>>>>;

/**
 * A single band. `null` bounds are open-ended.
 */
export interface Band {
  min: number | null;
  max: number | null;
  label: string;
}

/**
 * Banding rule for one numeric field.
 */
export interface BandingRule {
  field: string;
  bands: readonly Band[];
  columnName: string;
  minInclusive: boolean;
  maxExclusive: boolean;
  /** When false the band list was not checked for gaps/overlaps and the first matching band wins. */
  validated: boolean;
}

export type BandingSpec = Readonly<Record<string, BandingRule>>;

/**
 * A pure derivation over the record. Returned fields are added to, or
 * overwrite, the record before indexing and banding run.
 */
export interface CustomTransform {
  name: string;
  derive: (record: RawQuoteRecord) => Record<string, Scalar>;
}

export interface IndexOptions {
  /** Suffix for the indexed output column. Default: `_Index`. */
  suffix: string;
  /** Overwrite the source field instead of appending a new column. */
  replace: boolean;
}

export type StageName = 'custom' | 'index' | 'band';

/**
 * One resolved pipeline step. Stages are built once when a context is
 * created and applied in order to a working copy of each record.
 */
export interface Stage {
  stage: StageName;
  /** Field (or transform name, for custom stages) the step is responsible for. */
  target: string;
  apply: (record: Record<string, Scalar>) => void;
}

// ═══════════════════════════════════════════════════════════════════════════
// RATING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A loaded rating table. Entries are keyed by `tableKey` of the key-column
 * values.
 */
export interface RatingTable {
  name: string;
  keyColumns: readonly string[];
  valueColumn: string;
  entries: ReadonlyMap<string, number>;
}

export type FactorOperation = 'multiply' | 'add';

/**
 * Starting premium: a constant, or a lookup on designated base field(s).
 */
export type BaseRule =
  | { kind: 'constant'; value: number }
  | { kind: 'table'; table: string; fields: readonly string[] };

export interface FactorRule {
  name: string;
  table: string;
  /** Record fields read for the lookup, aligned with the table's key columns. */
  fields: readonly string[];
  operation: FactorOperation;
  /**
   * Fallback on a lookup miss. Absent means a miss is an error;
   * `'neutral'` is 1 for multiply and 0 for add.
   */
  default?: number | 'neutral';
}

export interface RatingPlan {
  base: BaseRule;
  factors: readonly FactorRule[];
  /** Decimal places for `final_premium`. Intermediate totals are never rounded. */
  rounding?: number;
}

export interface RatingConfig {
  plan: RatingPlan;
  tables: ReadonlyMap<string, RatingTable>;
}

/**
 * One entry in the factor trace.
 */
export interface FactorStep {
  name: string;
  operation: FactorOperation;
  value: number;
  running_total: number;
}

/**
 * Premium breakdown returned to callers.
 */
export interface PremiumResult {
  record_id?: Scalar;
  base_value: number;
  factors: FactorStep[];
  final_premium: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTEXT
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Immutable configuration threaded through every pipeline call.
 */
export interface PricingContext {
  primaryKey: string;
  categories: CategoryMapping;
  banding: BandingSpec;
  transforms: readonly CustomTransform[];
  rating: RatingConfig;
  stages: readonly Stage[];
}

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

export type ErrorKind =
  | 'SchemaError'
  | 'CategoryLookupError'
  | 'BandingError'
  | 'RatingLookupError'
  | 'ConfigurationError'
  | 'UnexpectedError';

/**
 * Plain, serializable error shape surfaced in batch output.
 */
export interface ErrorDescriptor {
  kind: ErrorKind;
  message: string;
  stage?: StageName;
  field?: string;
  value?: unknown;
  recordId?: Scalar;
}

export type RecordOutcome =
  | { ok: true; index: number; recordId?: Scalar; transformed: TransformedRecord; premium: PremiumResult }
  | { ok: false; index: number; recordId?: Scalar; error: ErrorDescriptor };

export interface BatchOptions {
  /** Records processed per chunk before progress is reported. Default: 500. */
  chunkSize?: number;
  onProgress?: (completed: number, total: number) => void;
  /** Render a progress bar and summary on the console. */
  showProgress?: boolean;
  /** Persist a JSON report. `true` writes under the configured log directory. */
  storeLogs?: boolean | string;
}

export interface BatchResult {
  results: RecordOutcome[];
  succeeded: number;
  failed: number;
  total: number;
  durationMs: number;
  logFolder?: string;
}

import type {
  BandingSpec,
  CategoryMapping,
  CustomTransform,
  ErrorDescriptor,
  IndexOptions,
  PricingContext,
  RawQuoteRecord,
  Scalar,
  Stage,
  StageName,
  TransformedRecord,
} from '../types.js';
import { SchemaError, TransformationError, toErrorDescriptor } from '../library/errors.js';
import { isScalar } from '../loader/loader.js';
import { createIndexStages, DEFAULT_INDEX_OPTIONS } from './indexer.js';
import { createBandStages } from './bander.js';

export interface StageConfig {
  transforms: readonly CustomTransform[];
  categories: CategoryMapping;
  banding: BandingSpec;
  index?: IndexOptions;
}

export type TransformOutcome =
  | { ok: true; index: number; recordId?: Scalar; record: TransformedRecord }
  | { ok: false; index: number; recordId?: Scalar; error: ErrorDescriptor };

/**
 * Later stages read fields earlier ones produce, so the order is fixed.
 */
export const STAGE_ORDER: readonly StageName[] = ['custom', 'index', 'band'];

const stageBuilders: Record<StageName, (config: StageConfig) => Stage[]> = {
  custom: ({ transforms }) => transforms.map(createCustomStage),
  index: ({ categories, index }) => createIndexStages(categories, index ?? DEFAULT_INDEX_OPTIONS),
  band: ({ banding }) => createBandStages(banding),
};

/**
 * Resolve configuration into the ordered list of stages applied to every
 * record. Called once per context.
 */
export function buildStages(config: StageConfig): Stage[] {
  return STAGE_ORDER.flatMap((name) => stageBuilders[name](config));
}

function createCustomStage(transform: CustomTransform): Stage {
  return {
    stage: 'custom',
    target: transform.name,
    apply: (record) => {
      // Derivations see a frozen snapshot so they stay pure
      const derived = transform.derive(Object.freeze({ ...record }));
      for (const [field, value] of Object.entries(derived)) {
        if (!isScalar(value)) {
          throw new SchemaError({
            message: `Transform "${transform.name}" produced a non-scalar value for "${field}"`,
            field,
            value,
          });
        }
        record[field] = value;
      }
    },
  };
}

export function recordIdOf(record: RawQuoteRecord, primaryKey: string): Scalar | undefined {
  const id = record[primaryKey];
  return id === undefined || id === null ? undefined : id;
}

/**
 * Run every stage over a copy of the record. Any stage failure aborts the
 * whole record with a TransformationError naming the stage and field.
 */
export function transformRecord(record: RawQuoteRecord, context: PricingContext): TransformedRecord {
  const recordId = recordIdOf(record, context.primaryKey);
  const working: Record<string, Scalar> = { ...record };

  for (const stage of context.stages) {
    try {
      stage.apply(working);
    } catch (error) {
      const original = error instanceof Error ? error : new Error(String(error));
      throw new TransformationError(stage.stage, stage.target, original, recordId);
    }
  }

  return Object.freeze(working);
}

/**
 * Transform many records; failures are collected per record.
 */
export function transformRecords(
  records: readonly RawQuoteRecord[],
  context: PricingContext
): TransformOutcome[] {
  return records.map((record, index): TransformOutcome => {
    const recordId = recordIdOf(record, context.primaryKey);
    try {
      return { ok: true, index, recordId, record: transformRecord(record, context) };
    } catch (error) {
      return { ok: false, index, recordId, error: toErrorDescriptor(error, recordId) };
    }
  });
}

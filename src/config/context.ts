import type {
  BandingRule,
  BandingSpec,
  CategoryMapping,
  CustomTransform,
  IndexOptions,
  PricingContext,
  RatingConfig,
  RatingPlan,
  RatingTable,
} from '../types.js';
import { ConfigurationError } from '../library/errors.js';
import { getSettings } from '../library/settings.js';
import { validateBands } from '../transform/bander.js';
import { DEFAULT_INDEX_OPTIONS } from '../transform/indexer.js';
import { buildStages } from '../transform/pipeline.js';

export interface ContextOptions {
  primaryKey?: string;
  categories?: CategoryMapping;
  banding?: BandingSpec;
  transforms?: readonly CustomTransform[];
  rating: RatingConfig;
  index?: Partial<IndexOptions>;
}

/**
 * Validate configuration and resolve it into an immutable context.
 * Everything here is checked once so per-record work never re-validates.
 *
 * @example
 * ```ts
 * const context = createPricingContext({
 *   categories: { Area: { A: 0, B: 1 } },
 *   rating: { plan: { base: { kind: 'constant', value: 200 }, factors: [] }, tables: new Map() },
 * });
 * ```
 */
export function createPricingContext(options: ContextOptions): PricingContext {
  const categories = cloneCategories(options.categories ?? {});
  const banding = cloneBanding(options.banding ?? {});
  const transforms = [...(options.transforms ?? [])];
  const index: IndexOptions = { ...DEFAULT_INDEX_OPTIONS, ...options.index };
  const rating: RatingConfig = {
    plan: clonePlan(options.rating.plan),
    // Map contents cannot be frozen; copying keeps caller mutations out
    tables: new Map(options.rating.tables),
  };

  validateCategories(categories);
  for (const rule of Object.values(banding)) {
    if (rule.validated) {
      validateBands(rule);
    }
  }
  validateTransforms(transforms);
  validateRating(rating);

  return deepFreeze({
    primaryKey: options.primaryKey ?? getSettings().primaryKey,
    categories,
    banding,
    transforms,
    rating,
    stages: buildStages({ transforms, categories, banding, index }),
  });
}

function validateCategories(categories: CategoryMapping): void {
  for (const [field, mapping] of Object.entries(categories)) {
    for (const [raw, index] of Object.entries(mapping)) {
      if (!Number.isInteger(index)) {
        throw new ConfigurationError(`Category index for ${field}="${raw}" must be an integer, got ${index}`);
      }
    }
  }
}

function validateTransforms(transforms: readonly CustomTransform[]): void {
  const names = new Set<string>();
  for (const transform of transforms) {
    if (names.has(transform.name)) {
      throw new ConfigurationError(`Duplicate custom transform "${transform.name}"`);
    }
    names.add(transform.name);
  }
}

/**
 * Every table the plan names must be loaded, and lookup fields must line
 * up with the table's key columns.
 */
export function validateRating(rating: RatingConfig, file?: string): void {
  const { plan, tables } = rating;

  const checkLookup = (owner: string, tableName: string, fields: readonly string[]) => {
    const table = tables.get(tableName);
    if (!table) {
      throw new ConfigurationError(`${owner} references unknown rating table "${tableName}"`, file);
    }
    if (fields.length !== table.keyColumns.length) {
      throw new ConfigurationError(
        `${owner} looks up ${fields.length} field(s) but table "${tableName}" has ${table.keyColumns.length} key column(s)`,
        file
      );
    }
  };

  if (plan.base.kind === 'table') {
    checkLookup('Base value', plan.base.table, plan.base.fields);
  } else if (!Number.isFinite(plan.base.value)) {
    throw new ConfigurationError(`Base value must be a finite number`, file);
  }

  const names = new Set<string>();
  for (const factor of plan.factors) {
    if (names.has(factor.name)) {
      throw new ConfigurationError(`Duplicate rating factor "${factor.name}"`, file);
    }
    names.add(factor.name);
    checkLookup(`Factor "${factor.name}"`, factor.table, factor.fields);
  }
}

function cloneCategories(categories: CategoryMapping): CategoryMapping {
  return Object.fromEntries(Object.entries(categories).map(([field, mapping]) => [field, { ...mapping }]));
}

function cloneBanding(banding: BandingSpec): BandingSpec {
  return Object.fromEntries(
    Object.entries(banding).map(([field, rule]): [string, BandingRule] => [
      field,
      { ...rule, bands: rule.bands.map((band) => ({ ...band })) },
    ])
  );
}

function clonePlan(plan: RatingPlan): RatingPlan {
  return {
    ...plan,
    base: plan.base.kind === 'table' ? { ...plan.base, fields: [...plan.base.fields] } : { ...plan.base },
    factors: plan.factors.map((factor) => ({ ...factor, fields: [...factor.fields] })),
  };
}

/**
 * Freeze plain objects and arrays recursively. Maps and functions are left
 * as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !(value instanceof Map) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function ratingTableMap(tables: readonly RatingTable[]): Map<string, RatingTable> {
  return new Map(tables.map((table) => [table.name, table]));
}

import type { CategoryMapping, IndexOptions, RawQuoteRecord, Scalar, Stage, TransformedRecord } from '../types.js';
import { CategoryLookupError, SchemaError } from '../library/errors.js';
import { DEFAULT_INDEX_SUFFIX } from '../library/constants.js';

export const DEFAULT_INDEX_OPTIONS: IndexOptions = {
  suffix: DEFAULT_INDEX_SUFFIX,
  replace: false,
};

/**
 * Resolve one categorical value to its index. Mapping keys are the string
 * form of the raw value, so `5` and `"5"` share an entry.
 */
export function indexCategory(
  field: string,
  value: Scalar | undefined,
  mapping: Readonly<Record<string, number>>
): number {
  if (value === undefined || value === null || value === '') {
    throw new SchemaError({ message: `Missing categorical field "${field}"`, field, value: value ?? null });
  }
  const key = String(value);
  if (!Object.hasOwn(mapping, key)) {
    throw new CategoryLookupError(field, value);
  }
  return mapping[key];
}

export function indexColumnName(field: string, options: IndexOptions): string {
  return options.replace ? field : `${field}${options.suffix}`;
}

/**
 * One stage per mapped field. Each field is resolved independently.
 */
export function createIndexStages(
  categories: CategoryMapping,
  options: IndexOptions = DEFAULT_INDEX_OPTIONS
): Stage[] {
  return Object.entries(categories).map(([field, mapping]): Stage => {
    const column = indexColumnName(field, options);
    return {
      stage: 'index',
      target: field,
      apply: (record) => {
        record[column] = indexCategory(field, record[field], mapping);
      },
    };
  });
}

/**
 * Index every mapped field of a record without running the other stages.
 */
export function applyCategoryIndex(
  record: RawQuoteRecord,
  categories: CategoryMapping,
  options: IndexOptions = DEFAULT_INDEX_OPTIONS
): TransformedRecord {
  const working: Record<string, Scalar> = { ...record };
  for (const stage of createIndexStages(categories, options)) {
    stage.apply(working);
  }
  return Object.freeze(working);
}

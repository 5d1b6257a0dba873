import type { Band, BandingRule, BandingSpec, RawQuoteRecord, Scalar, Stage, TransformedRecord } from '../types.js';
import { BandingError, ConfigurationError, SchemaError } from '../library/errors.js';

/**
 * Whether `value` falls inside `band` under the rule's inclusivity flags.
 * `null` bounds are unbounded.
 */
export function bandContains(
  band: Band,
  value: number,
  rule: Pick<BandingRule, 'minInclusive' | 'maxExclusive'>
): boolean {
  const aboveMin = band.min === null || (rule.minInclusive ? value >= band.min : value > band.min);
  const belowMax = band.max === null || (rule.maxExclusive ? value < band.max : value <= band.max);
  return aboveMin && belowMax;
}

/**
 * First band containing the value, in list order. On a validated rule at
 * most one band can match.
 */
export function findBand(rule: BandingRule, value: number): Band | undefined {
  return rule.bands.find((band) => bandContains(band, value, rule));
}

/**
 * Label for a field value. Throws BandingError when no band matches.
 */
export function bandValue(rule: BandingRule, value: Scalar | undefined): string {
  if (value === undefined || value === null || value === '') {
    throw new SchemaError({ message: `Missing numeric field "${rule.field}"`, field: rule.field, value: value ?? null });
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SchemaError({
      message: `Field "${rule.field}" must be numeric, got ${JSON.stringify(value)}`,
      field: rule.field,
      value,
    });
  }
  const band = findBand(rule, value);
  if (!band) {
    throw new BandingError(rule.field, value);
  }
  return band.label;
}

/**
 * Bands must be ordered, contiguous and non-overlapping. A shared boundary
 * has to belong to exactly one side, so lower-inclusive requires
 * upper-exclusive and vice versa.
 */
export function validateBands(rule: BandingRule, file?: string): void {
  const { field, bands } = rule;
  if (bands.length === 0) {
    throw new ConfigurationError(`Field "${field}" has no bands`, file);
  }

  bands.forEach((band, i) => {
    if (band.min !== null && band.max !== null && band.min >= band.max) {
      throw new ConfigurationError(`Band "${band.label}" of "${field}" has min ${band.min} >= max ${band.max}`, file);
    }
    if (band.min === null && i !== 0) {
      throw new ConfigurationError(`Only the first band of "${field}" may have an open lower bound`, file);
    }
    if (band.max === null && i !== bands.length - 1) {
      throw new ConfigurationError(`Only the last band of "${field}" may have an open upper bound`, file);
    }
  });

  if (bands.length > 1 && rule.minInclusive !== rule.maxExclusive) {
    const problem = rule.minInclusive ? 'overlap' : 'are excluded from both';
    throw new ConfigurationError(
      `Boundaries of "${field}" ${problem} adjacent bands with min_inclusive=${rule.minInclusive}, max_exclusive=${rule.maxExclusive}`,
      file
    );
  }

  for (let i = 1; i < bands.length; i++) {
    const prev = bands[i - 1];
    const curr = bands[i];
    // Both bounds are non-null here: only the first min and last max may be open
    if (prev.max === null || curr.min === null) continue;
    if (prev.max < curr.min) {
      throw new ConfigurationError(
        `Gap in "${field}" between "${prev.label}" (max ${prev.max}) and "${curr.label}" (min ${curr.min})`,
        file
      );
    }
    if (prev.max > curr.min) {
      throw new ConfigurationError(
        `Bands "${prev.label}" and "${curr.label}" of "${field}" overlap (${curr.min} < ${prev.max})`,
        file
      );
    }
  }
}

export function createBandStages(banding: BandingSpec): Stage[] {
  return Object.values(banding).map((rule): Stage => ({
    stage: 'band',
    target: rule.field,
    apply: (record) => {
      record[rule.columnName] = bandValue(rule, record[rule.field]);
    },
  }));
}

/**
 * Band every configured field of a record without running the other stages.
 */
export function applyBanding(record: RawQuoteRecord, banding: BandingSpec): TransformedRecord {
  const working: Record<string, Scalar> = { ...record };
  for (const stage of createBandStages(banding)) {
    stage.apply(working);
  }
  return Object.freeze(working);
}

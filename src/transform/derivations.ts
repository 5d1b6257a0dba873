import type { CustomTransform, RawQuoteRecord, Scalar } from '../types.js';
import { SchemaError } from '../library/errors.js';

/**
 * Wrap a derivation function as a named custom transform.
 *
 * @example
 * ```ts
 * const density = defineTransform('logDensity', (quote) => ({
 *   LogDensity: Math.log(Number(quote.Density)),
 * }));
 * ```
 */
export function defineTransform(
  name: string,
  derive: (record: RawQuoteRecord) => Record<string, Scalar>
): CustomTransform {
  return { name, derive };
}

function requireNumber(record: RawQuoteRecord, field: string): number {
  const value = record[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SchemaError({
      message: `Field "${field}" must be numeric, got ${JSON.stringify(value ?? null)}`,
      field,
      value: value ?? null,
    });
  }
  return value;
}

/** DrivAge -> DrivAgeBand: Under 25, 25-39, 40-59, 60+ */
export const driverAgeBand = defineTransform('driverAgeBand', (record) => {
  const age = requireNumber(record, 'DrivAge');
  let band: string;
  if (age < 25) band = 'Under 25';
  else if (age < 40) band = '25-39';
  else if (age < 60) band = '40-59';
  else band = '60+';
  return { DrivAgeBand: band };
});

/** VehPower -> PowerGroup: Low (<5), Medium (<8), High */
export const powerGroup = defineTransform('powerGroup', (record) => {
  const power = requireNumber(record, 'VehPower');
  return { PowerGroup: power < 5 ? 'Low' : power < 8 ? 'Medium' : 'High' };
});

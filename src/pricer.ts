import type { PremiumResult, PricingContext, RawQuoteRecord, Scalar, TransformedRecord } from './types.js';
import { recordIdOf, transformRecord } from './transform/pipeline.js';
import { rate } from './rating/engine.js';

export interface PricedQuote {
  recordId?: Scalar;
  transformed: TransformedRecord;
  premium: PremiumResult;
}

/**
 * Transform and rate a single quote. Errors propagate to the caller.
 *
 * @example
 * ```ts
 * const { premium } = priceQuote({ IDpol: 1, DrivAge: 30, Area: 'A' }, context);
 * console.log(premium.final_premium);
 * ```
 */
export function priceQuote(record: RawQuoteRecord, context: PricingContext): PricedQuote {
  const recordId = recordIdOf(record, context.primaryKey);
  const transformed = transformRecord(record, context);
  const premium = rate(transformed, context.rating, recordId);
  return { ...(recordId !== undefined && { recordId }), transformed, premium };
}

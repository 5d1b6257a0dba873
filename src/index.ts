// Re-export types
export type {
  // Record types
  Scalar,
  RawQuoteRecord,
  TransformedRecord,
  Table,
  // Transformation types
  CategoryMapping,
  Band,
  BandingRule,
  BandingSpec,
  CustomTransform,
  IndexOptions,
  Stage,
  StageName,
  // Rating types
  RatingTable,
  FactorOperation,
  BaseRule,
  FactorRule,
  RatingPlan,
  RatingConfig,
  FactorStep,
  PremiumResult,
  // Context & outcome types
  PricingContext,
  ErrorKind,
  ErrorDescriptor,
  RecordOutcome,
  BatchOptions,
  BatchResult,
} from './types.js';

export type { LoadOptions } from './loader/loader.js';
export type { ContextOptions } from './config/context.js';
export type { LoadContextOptions } from './config/load.js';
export type { ContextStore } from './config/store.js';
export type { PricedQuote } from './pricer.js';
export type { TransformOutcome } from './transform/pipeline.js';
export type { PricerSettings } from './library/settings.js';

// Re-export errors
export {
  PricingError,
  SchemaError,
  CategoryLookupError,
  BandingError,
  RatingLookupError,
  ConfigurationError,
  TransformationError,
  toErrorDescriptor,
} from './library/errors.js';

// Re-export loader
export { loadQuotes, readRecordFile, mergeRecords, validatePrimaryKeys } from './loader/loader.js';

// Re-export configuration
export { createPricingContext } from './config/context.js';
export { loadPricingContext, loadCategoryMapping, loadBandingSpec, loadRatingConfig } from './config/load.js';
export { createContextStore } from './config/store.js';
export { getSettings } from './library/settings.js';

// Re-export transformation
export { indexCategory, applyCategoryIndex } from './transform/indexer.js';
export { bandValue, findBand, validateBands, applyBanding } from './transform/bander.js';
export { defineTransform, driverAgeBand, powerGroup } from './transform/derivations.js';
export { buildStages, transformRecord, transformRecords, STAGE_ORDER } from './transform/pipeline.js';

// Re-export rating
export { rate } from './rating/engine.js';
export { parseRatingTable, loadRatingTable } from './rating/tables.js';

// Re-export pricing
export { priceQuote } from './pricer.js';
export { priceBatch } from './batch/batch.js';

// Main pricer namespace
import type { BatchOptions, BatchResult, PricingContext, RawQuoteRecord, Table, TransformedRecord } from './types.js';
import type { LoadContextOptions } from './config/load.js';
import type { LoadOptions } from './loader/loader.js';
import type { PricedQuote } from './pricer.js';
import { loadPricingContext } from './config/load.js';
import { loadQuotes } from './loader/loader.js';
import { priceQuote } from './pricer.js';
import { priceBatch } from './batch/batch.js';
import { transformRecord } from './transform/pipeline.js';

/**
 * Main pricer namespace for fluent API.
 *
 * @example
 * ```ts
 * import { pricer, powerGroup } from 'quote-pricer';
 *
 * const context = await pricer.load('./config', { transforms: [powerGroup] });
 * const quotes = await pricer.quotes('./data/batch/quotes.csv');
 * const result = await pricer.priceBatch(quotes, context, { showProgress: true });
 *
 * console.log(`${result.succeeded}/${result.total} priced`);
 * ```
 */
export const pricer = {
  /**
   * Load configuration files into an immutable pricing context.
   */
  load(configDir?: string, options?: LoadContextOptions): Promise<PricingContext> {
    return loadPricingContext(configDir, options);
  },

  /**
   * Load quote records from a file or directory.
   */
  quotes(source: string, options?: LoadOptions): Promise<Table> {
    return loadQuotes(source, options);
  },

  /**
   * Run the transformation stages only.
   */
  transform(record: RawQuoteRecord, context: PricingContext): TransformedRecord {
    return transformRecord(record, context);
  },

  /**
   * Price one quote; errors are thrown.
   */
  price(record: RawQuoteRecord, context: PricingContext): PricedQuote {
    return priceQuote(record, context);
  },

  /**
   * Price many quotes; errors are collected per record.
   */
  priceBatch(
    input: Table | readonly RawQuoteRecord[],
    context: PricingContext,
    options?: BatchOptions
  ): Promise<BatchResult> {
    return priceBatch(input, context, options);
  },
};

export default pricer;

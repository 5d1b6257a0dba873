import * as crypto from 'crypto';
import * as path from 'path';
import type { BatchOptions, BatchResult, PricingContext, RawQuoteRecord, RecordOutcome, Table } from '../types.js';
import { toErrorDescriptor } from '../library/errors.js';
import { DEFAULT_CHUNK_SIZE } from '../library/constants.js';
import { getSettings } from '../library/settings.js';
import { createProgressTracker } from '../library/ui.js';
import { recordIdOf } from '../transform/pipeline.js';
import { priceQuote } from '../pricer.js';
import { logBatchSummary, writeBatchLogs } from './batch-logging.js';

/**
 * Price one record, turning any failure into an error outcome.
 */
export function priceOutcome(record: RawQuoteRecord, index: number, context: PricingContext): RecordOutcome {
  const recordId = recordIdOf(record, context.primaryKey);
  try {
    const { transformed, premium } = priceQuote(record, context);
    return { ok: true, index, recordId, transformed, premium };
  } catch (error) {
    return { ok: false, index, recordId, error: toErrorDescriptor(error, recordId) };
  }
}

/**
 * Price every record. A failing record yields an error descriptor in its
 * slot; the rest of the batch still runs. Results keep input order.
 *
 * Records share nothing but the frozen context, so chunks can be spread
 * across workers; here they run sequentially, yielding between chunks so
 * progress can render.
 */
export async function priceBatch(
  input: Table | readonly RawQuoteRecord[],
  context: PricingContext,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const records = isTable(input) ? input.rows : input;
  const chunkSize = options.chunkSize && options.chunkSize > 0 ? options.chunkSize : DEFAULT_CHUNK_SIZE;
  const startTime = Date.now();

  const logPath = options.storeLogs
    ? typeof options.storeLogs === 'string'
      ? options.storeLogs
      : path.join(getSettings().logDir, `batch_${Date.now()}_${crypto.randomUUID().slice(0, 8)}`, 'rawData.json')
    : undefined;

  const progress = options.showProgress ? createProgressTracker('quotes') : null;
  const report = (completed: number) => {
    options.onProgress?.(completed, records.length);
    progress?.update(completed, records.length);
  };

  const results: RecordOutcome[] = [];
  report(0);
  for (let i = 0; i < records.length; i += chunkSize) {
    const chunk = records.slice(i, i + chunkSize);
    chunk.forEach((record, offset) => results.push(priceOutcome(record, i + offset, context)));
    report(results.length);

    if (i + chunkSize < records.length) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }
  progress?.finish();

  const succeeded = results.filter((r) => r.ok).length;
  const durationMs = Date.now() - startTime;
  const batchResult: BatchResult = {
    results,
    succeeded,
    failed: results.length - succeeded,
    total: results.length,
    durationMs,
    ...(logPath && { logFolder: path.dirname(logPath) }),
  };

  if (options.showProgress) {
    logBatchSummary(batchResult);
  }
  if (logPath) {
    writeBatchLogs(logPath, batchResult, context);
  }

  return batchResult;
}

function isTable(input: Table | readonly RawQuoteRecord[]): input is Table {
  return !Array.isArray(input);
}

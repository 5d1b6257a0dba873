import * as fs from 'fs';
import * as path from 'path';
import type { BatchResult, ErrorDescriptor, ErrorKind, PricingContext, RecordOutcome } from '../types.js';
import { theme, formatDuration, formatPercentage } from '../library/ui.js';

const MAX_LISTED_FAILURES = 5;

/**
 * Structure for rawData.json output from priceBatch()
 */
export interface BatchReport {
  metadata: {
    timestamp: string;
    primaryKey: string;
    factors: string[];
    recordCount: number;
  };
  summary: {
    succeeded: number;
    failed: number;
    total: number;
    successRate: number;
    failuresByKind: Partial<Record<ErrorKind, number>>;
    totalPremium: number;
    durationMs: number;
  };
  records: RecordOutcome[];
}

export function buildBatchReport(result: BatchResult, context: PricingContext): BatchReport {
  const failuresByKind: Partial<Record<ErrorKind, number>> = {};
  let totalPremium = 0;
  for (const outcome of result.results) {
    if (outcome.ok) {
      totalPremium += outcome.premium.final_premium;
    } else {
      failuresByKind[outcome.error.kind] = (failuresByKind[outcome.error.kind] ?? 0) + 1;
    }
  }

  return {
    metadata: {
      timestamp: new Date().toISOString(),
      primaryKey: context.primaryKey,
      factors: context.rating.plan.factors.map((f) => f.name),
      recordCount: result.total,
    },
    summary: {
      succeeded: result.succeeded,
      failed: result.failed,
      total: result.total,
      successRate: result.total > 0 ? result.succeeded / result.total : 0,
      failuresByKind,
      totalPremium,
      durationMs: result.durationMs,
    },
    records: result.results,
  };
}

/**
 * Write batch results to rawData.json
 *
 * Runs after pricing completes; a write failure is reported and swallowed
 * so the batch result is still returned.
 */
export function writeBatchLogs(logPath: string, result: BatchResult, context: PricingContext): void {
  try {
    const dir = path.dirname(logPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(logPath, JSON.stringify(buildBatchReport(result, context), null, 2), 'utf-8');
  } catch (error) {
    console.error(
      `Failed to write batch logs to ${logPath}:`,
      error instanceof Error ? error.message : String(error)
    );
  }
}

/**
 * One line per failure: `#index (id) Kind field=value: message`.
 */
export function formatFailure(index: number, error: ErrorDescriptor): string {
  const id = error.recordId !== undefined ? ` (${String(error.recordId)})` : '';
  const field = error.field !== undefined ? ` ${error.field}=${JSON.stringify(error.value ?? null)}` : '';
  return `#${index}${id} ${error.kind}${field}: ${error.message}`;
}

export function logBatchSummary(result: BatchResult): void {
  const rate = result.total > 0 ? result.succeeded / result.total : 0;
  const icon = result.failed === 0 ? theme.check : result.succeeded > 0 ? theme.warn : theme.cross;

  console.log('');
  console.log(theme.divider('Batch'));
  console.log(
    `  ${icon} ${theme.bold(formatPercentage(rate))} priced  ${theme.dim(`(${result.succeeded}/${result.total})`)}${theme.separator}${theme.dim(formatDuration(result.durationMs))}`
  );

  const failures = result.results.filter(
    (r): r is Extract<RecordOutcome, { ok: false }> => !r.ok
  );
  for (const failure of failures.slice(0, MAX_LISTED_FAILURES)) {
    console.log(`    ${theme.bullet} ${theme.error(formatFailure(failure.index, failure.error))}`);
  }
  if (failures.length > MAX_LISTED_FAILURES) {
    console.log(`    ${theme.dim(`…and ${failures.length - MAX_LISTED_FAILURES} more`)}`);
  }
  if (result.logFolder) {
    console.log(`  ${theme.dim('Logs:')} ${result.logFolder}`);
  }
}

import type {
  BaseRule,
  FactorOperation,
  FactorRule,
  FactorStep,
  PremiumResult,
  RatingConfig,
  RatingTable,
  Scalar,
  TransformedRecord,
} from '../types.js';
import { ConfigurationError, RatingLookupError, SchemaError } from '../library/errors.js';
import { displayKey, tableKey } from './tables.js';

const BASE_FACTOR_NAME = 'base';

/**
 * Price one transformed record: resolve the base value, then apply each
 * factor to the running premium in configured order.
 *
 * Pure: the result depends only on the record, the tables and the plan.
 */
export function rate(record: TransformedRecord, rating: RatingConfig, recordId?: Scalar): PremiumResult {
  try {
    const baseValue = resolveBase(record, rating.plan.base, rating.tables);

    let running = baseValue;
    const factors: FactorStep[] = [];
    for (const rule of rating.plan.factors) {
      const value = resolveFactor(record, rule, rating.tables);
      running = applyOperation(rule.operation, running, value);
      factors.push({ name: rule.name, operation: rule.operation, value, running_total: running });
    }

    return {
      ...(recordId !== undefined && { record_id: recordId }),
      base_value: baseValue,
      factors,
      final_premium: roundTo(running, rating.plan.rounding),
    };
  } catch (error) {
    if (error instanceof RatingLookupError || error instanceof SchemaError) {
      error.recordId ??= recordId;
    }
    throw error;
  }
}

export function applyOperation(operation: FactorOperation, running: number, value: number): number {
  switch (operation) {
    case 'multiply':
      return running * value;
    case 'add':
      return running + value;
  }
}

/** 1 for multiply, 0 for add. */
export function neutralValue(operation: FactorOperation): number {
  return operation === 'multiply' ? 1 : 0;
}

export function roundTo(value: number, decimals?: number): number {
  if (decimals === undefined) return value;
  const factor = 10 ** decimals;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

function resolveBase(
  record: TransformedRecord,
  base: BaseRule,
  tables: ReadonlyMap<string, RatingTable>
): number {
  if (base.kind === 'constant') {
    return base.value;
  }
  const table = requireTable(tables, base.table);
  const keyValues = lookupValues(record, base.fields);
  const value = table.entries.get(tableKey(keyValues));
  if (value === undefined) {
    throw new RatingLookupError(BASE_FACTOR_NAME, table.name, displayKey(keyValues));
  }
  return value;
}

function resolveFactor(
  record: TransformedRecord,
  rule: FactorRule,
  tables: ReadonlyMap<string, RatingTable>
): number {
  const table = requireTable(tables, rule.table);
  const keyValues = lookupValues(record, rule.fields);
  const value = table.entries.get(tableKey(keyValues));
  if (value !== undefined) {
    return value;
  }
  if (rule.default === 'neutral') {
    return neutralValue(rule.operation);
  }
  if (rule.default !== undefined) {
    return rule.default;
  }
  throw new RatingLookupError(rule.name, table.name, displayKey(keyValues));
}

function lookupValues(record: TransformedRecord, fields: readonly string[]): Scalar[] {
  return fields.map((field) => {
    const value = record[field];
    if (value === undefined || value === null) {
      throw new SchemaError({ message: `Missing rating field "${field}"`, field, value: null });
    }
    return value;
  });
}

function requireTable(tables: ReadonlyMap<string, RatingTable>, name: string): RatingTable {
  const table = tables.get(name);
  if (!table) {
    // Contexts are validated on load, so this only fires for hand-built configs
    throw new ConfigurationError(`Unknown rating table "${name}"`);
  }
  return table;
}

import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import type {
  BandingRule,
  BandingSpec,
  BaseRule,
  CategoryMapping,
  CustomTransform,
  FactorRule,
  IndexOptions,
  PricingContext,
  RatingConfig,
  RatingPlan,
  RatingTable,
} from '../types.js';
import { ConfigurationError } from '../library/errors.js';
import {
  CATEGORY_INDEX_FILE,
  CONTINUOUS_BANDING_FILE,
  DEFAULT_BAND_SUFFIX,
  RATING_PLAN_FILE,
} from '../library/constants.js';
import { getSettings } from '../library/settings.js';
import { spinner } from '../library/ui.js';
import { validateBands } from '../transform/bander.js';
import { loadRatingTable } from '../rating/tables.js';
import { createPricingContext, ratingTableMap, validateRating } from './context.js';
import {
  bandingFileSchema,
  categoryIndexSchema,
  formatIssues,
  ratingFileSchema,
  type BandingFile,
  type RatingFile,
} from './schemas.js';

export interface LoadContextOptions {
  primaryKey?: string;
  transforms?: readonly CustomTransform[];
  index?: Partial<IndexOptions>;
  /** Show a spinner while loading. */
  verbose?: boolean;
}

/**
 * Load every configuration file in `configDir` and build a pricing context.
 * Category and banding files are optional; `rating.json` is required.
 * Any malformed file throws ConfigurationError.
 *
 * @example
 * ```ts
 * const context = await loadPricingContext('./config', { transforms: [powerGroup] });
 * ```
 */
export async function loadPricingContext(
  configDir?: string,
  options: LoadContextOptions = {}
): Promise<PricingContext> {
  const settings = getSettings({ configDir, primaryKey: options.primaryKey });
  const dir = settings.configDir;

  if (options.verbose) spinner.start(`Loading pricing configuration from ${dir}`);

  try {
    const categories = await loadCategoryMapping(path.join(dir, CATEGORY_INDEX_FILE));
    const banding = await loadBandingSpec(path.join(dir, CONTINUOUS_BANDING_FILE));
    const rating = await loadRatingConfig(path.join(dir, RATING_PLAN_FILE));

    const context = createPricingContext({
      primaryKey: settings.primaryKey,
      categories,
      banding,
      rating,
      transforms: options.transforms,
      index: options.index,
    });

    if (options.verbose) {
      spinner.succeed(
        `Loaded ${Object.keys(categories).length} category mappings, ${Object.keys(banding).length} banded fields, ${rating.tables.size} rating tables`
      );
    }
    return context;
  } catch (error) {
    if (options.verbose) spinner.fail('Failed to load pricing configuration');
    throw error;
  }
}

export async function loadCategoryMapping(file: string): Promise<CategoryMapping> {
  const data = await readJsonFile(file, { optional: true });
  if (data === undefined) return {};
  return parseWith(categoryIndexSchema, data, file);
}

export async function loadBandingSpec(file: string): Promise<BandingSpec> {
  const data = await readJsonFile(file, { optional: true });
  if (data === undefined) return {};
  return toBandingSpec(parseWith(bandingFileSchema, data, file), path.basename(file));
}

/**
 * Parse rating.json and every table it declares. Table paths are relative
 * to the plan file.
 */
export async function loadRatingConfig(file: string): Promise<RatingConfig> {
  const data = await readJsonFile(file, { optional: false });
  const parsed = parseWith(ratingFileSchema, data, file);
  const baseDir = path.dirname(file);

  const tables: RatingTable[] = [];
  for (const [name, ref] of Object.entries(parsed.tables)) {
    tables.push(
      await loadRatingTable(path.resolve(baseDir, ref.file), { name, keyColumns: ref.keys, valueColumn: ref.value })
    );
  }

  const tableMap = ratingTableMap(tables);
  const rating: RatingConfig = { plan: toRatingPlan(parsed, tableMap, path.basename(file)), tables: tableMap };
  validateRating(rating, path.basename(file));
  return rating;
}

/**
 * Validated rules keep the file's band order; `validate: false` rules are
 * kept as written and resolved first-match-wins.
 */
export function toBandingSpec(file: BandingFile, fileName?: string): BandingSpec {
  const spec: Record<string, BandingRule> = {};
  for (const [field, config] of Object.entries(file)) {
    const rule: BandingRule = {
      field,
      bands: config.bands,
      columnName: config.column_name ?? `${field}${DEFAULT_BAND_SUFFIX}`,
      minInclusive: config.min_inclusive,
      maxExclusive: config.max_exclusive,
      validated: config.validate,
    };
    if (rule.validated) {
      validateBands(rule, fileName);
    }
    spec[field] = rule;
  }
  return spec;
}

function toRatingPlan(file: RatingFile, tables: ReadonlyMap<string, RatingTable>, fileName: string): RatingPlan {
  // Lookup fields default to the table's own key columns
  const keysOf = (tableName: string, owner: string): readonly string[] => {
    const table = tables.get(tableName);
    if (!table) {
      throw new ConfigurationError(`${owner} references unknown rating table "${tableName}"`, fileName);
    }
    return table.keyColumns;
  };

  const base: BaseRule =
    'value' in file.base
      ? { kind: 'constant', value: file.base.value }
      : { kind: 'table', table: file.base.table, fields: file.base.fields ?? keysOf(file.base.table, 'Base value') };

  const factors: FactorRule[] = file.factors.map((factor) => ({
    name: factor.name,
    table: factor.table,
    fields: factor.fields ?? keysOf(factor.table, `Factor "${factor.name}"`),
    operation: factor.operation,
    ...(factor.default !== undefined && { default: factor.default }),
  }));

  return { base, factors, ...(file.rounding !== undefined && { rounding: file.rounding }) };
}

async function readJsonFile(file: string, { optional }: { optional: boolean }): Promise<unknown> {
  let content: string;
  try {
    content = await fs.promises.readFile(file, 'utf-8');
  } catch (error) {
    if (optional && isNotFound(error)) return undefined;
    throw new ConfigurationError(
      `Cannot read configuration: ${error instanceof Error ? error.message : String(error)}`,
      path.basename(file)
    );
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      path.basename(file)
    );
  }
}

function parseWith<T extends z.ZodTypeAny>(schema: T, data: unknown, file: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error), path.basename(file));
  }
  return result.data;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

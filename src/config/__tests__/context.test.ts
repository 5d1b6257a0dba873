import { describe, it, expect } from 'vitest';
import { createPricingContext, deepFreeze, validateRating } from '../context.js';
import { createContextStore } from '../store.js';
import { parseRatingTable } from '../../rating/tables.js';
import { defineTransform } from '../../transform/derivations.js';
import { ConfigurationError } from '../../library/errors.js';
import type { CategoryMapping, PricingContext, RatingConfig, Scalar } from '../../types.js';

const areaTable = parseRatingTable('Area,factor\nA,1.1\nB,0.9\n', { name: 'area', keyColumns: ['Area'] });

function rating(overrides: Partial<RatingConfig['plan']> = {}): RatingConfig {
  return {
    plan: {
      base: { kind: 'constant', value: 100 },
      factors: [{ name: 'Area', table: 'area', fields: ['Area'], operation: 'multiply' }],
      ...overrides,
    },
    tables: new Map([['area', areaTable]]),
  };
}

describe('createPricingContext', () => {
  it('defaults the primary key from settings', () => {
    const context = createPricingContext({ rating: rating() });
    expect(context.primaryKey).toBe(process.env.PRICER_PRIMARY_KEY || 'IDpol');
  });

  it('copies inputs so later caller mutations have no effect', () => {
    const area: Record<string, number> = { A: 0 };
    const categories: CategoryMapping = { Area: area };
    const context = createPricingContext({ primaryKey: 'id', categories, rating: rating() });
    area.B = 1;
    expect(context.categories).toEqual({ Area: { A: 0 } });
    expect(Object.isFrozen(context.categories.Area)).toBe(true);
  });

  it('rejects non-integer category indices', () => {
    expect(() => createPricingContext({ categories: { Area: { A: 0.5 } }, rating: rating() })).toThrow(
      'Category index for Area="A" must be an integer, got 0.5'
    );
  });

  it('rejects duplicate custom transform names', () => {
    const noop = defineTransform('noop', () => ({}));
    expect(() => createPricingContext({ transforms: [noop, noop], rating: rating() })).toThrow(
      'Duplicate custom transform "noop"'
    );
  });

  it('validates bands unless disabled', () => {
    const overlapping = {
      field: 'DrivAge',
      bands: [
        { min: 0, max: 50, label: 'a' },
        { min: 30, max: 70, label: 'b' },
      ],
      columnName: 'DrivAgeBand',
      minInclusive: true,
      maxExclusive: true,
    };
    expect(() =>
      createPricingContext({ banding: { DrivAge: { ...overlapping, validated: true } }, rating: rating() })
    ).toThrow(ConfigurationError);
    expect(() =>
      createPricingContext({ banding: { DrivAge: { ...overlapping, validated: false } }, rating: rating() })
    ).not.toThrow();
  });

  it('applies index options to the stages', () => {
    const context = createPricingContext({
      categories: { Area: { A: 3 } },
      index: { replace: true },
      rating: rating(),
    });
    const record: Record<string, Scalar> = { Area: 'A' };
    context.stages[0].apply(record);
    expect(record).toEqual({ Area: 3 });
  });
});

describe('validateRating', () => {
  it('rejects duplicate factor names', () => {
    const factor = { name: 'Area', table: 'area', fields: ['Area'], operation: 'multiply' as const };
    expect(() => validateRating(rating({ factors: [factor, factor] }))).toThrow('Duplicate rating factor "Area"');
  });

  it('rejects a non-finite constant base', () => {
    expect(() => validateRating(rating({ base: { kind: 'constant', value: Number.NaN } }))).toThrow(
      'Base value must be a finite number'
    );
  });

  it('checks the base table exists', () => {
    expect(() =>
      validateRating(rating({ base: { kind: 'table', table: 'base', fields: ['Area'] } }), 'rating.json')
    ).toThrow('rating.json: Base value references unknown rating table "base"');
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects but leaves maps writable', () => {
    const value = deepFreeze({ nested: { list: [1, 2] }, lookup: new Map<string, number>() });
    expect(Object.isFrozen(value.nested.list)).toBe(true);
    value.lookup.set('a', 1);
    expect(value.lookup.get('a')).toBe(1);
  });
});

describe('createContextStore', () => {
  function contextWithBase(value: number): PricingContext {
    return createPricingContext({ primaryKey: 'IDpol', rating: rating({ base: { kind: 'constant', value } }) });
  }

  it('swaps the whole context on reload', async () => {
    let version = 100;
    const store = await createContextStore(async () => contextWithBase(version));
    const before = store.current();

    version = 200;
    await store.reload();

    expect(before.rating.plan.base).toEqual({ kind: 'constant', value: 100 });
    expect(store.current().rating.plan.base).toEqual({ kind: 'constant', value: 200 });
  });

  it('keeps the current context when a reload fails', async () => {
    let fail = false;
    const store = await createContextStore(async () => {
      if (fail) throw new ConfigurationError('Invalid JSON', 'rating.json');
      return contextWithBase(100);
    });
    const before = store.current();

    fail = true;
    await expect(store.reload()).rejects.toThrow('rating.json: Invalid JSON');
    expect(store.current()).toBe(before);
  });

  it('shares one load between concurrent reloads', async () => {
    let loads = 0;
    const store = await createContextStore(async () => {
      loads += 1;
      return contextWithBase(100 + loads);
    });

    const [a, b] = await Promise.all([store.reload(), store.reload()]);

    expect(loads).toBe(2);
    expect(a).toBe(b);
    expect(store.current()).toBe(a);
  });
});

import * as path from 'path';
import { fileURLToPath } from 'url';
import { describe, it, expect } from 'vitest';

// Import everything from the package
import pricerDefault, {
  // Namespace
  pricer,
  // Errors
  PricingError,
  SchemaError,
  CategoryLookupError,
  BandingError,
  RatingLookupError,
  ConfigurationError,
  TransformationError,
  // Transformation
  powerGroup,
  driverAgeBand,
  transformRecord,
  // Rating
  rate,
} from '../index.js';

const exampleDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '../../example/motor');
const configDir = path.join(exampleDir, 'config');

const sampleQuote = {
  IDpol: 1,
  VehPower: 5,
  VehAge: 2,
  DrivAge: 30,
  BonusMalus: 50,
  VehBrand: 'B1',
  VehGas: 'Regular',
  Area: 'A',
  Density: 800,
  Region: 'R1',
};

describe('index exports', () => {
  it('exports the pricer namespace as default', () => {
    expect(pricerDefault).toBe(pricer);
    expect(typeof pricer.load).toBe('function');
    expect(typeof pricer.quotes).toBe('function');
    expect(typeof pricer.transform).toBe('function');
    expect(typeof pricer.price).toBe('function');
    expect(typeof pricer.priceBatch).toBe('function');
  });

  it('exports the error hierarchy', () => {
    for (const ErrorClass of [SchemaError, CategoryLookupError, BandingError, RatingLookupError, ConfigurationError]) {
      expect(ErrorClass.prototype).toBeInstanceOf(PricingError);
    }
    expect(TransformationError.prototype).toBeInstanceOf(Error);
  });

  it('exports the bundled derivations', () => {
    expect(powerGroup.name).toBe('powerGroup');
    expect(driverAgeBand.name).toBe('driverAgeBand');
  });
});

describe('pricing a quote end to end', () => {
  it('transforms and rates the sample quote', async () => {
    const context = await pricer.load(configDir, { primaryKey: 'IDpol', transforms: [powerGroup] });
    const { recordId, transformed, premium } = pricer.price(sampleQuote, context);

    expect(recordId).toBe(1);
    expect(transformed).toEqual({
      ...sampleQuote,
      PowerGroup: 'Medium',
      VehBrand_Index: 0,
      VehGas_Index: 0,
      Area_Index: 0,
      Region_Index: 0,
      DrivAgeBand: '25-39',
      VehAgeBand: '0-2',
    });
    expect(premium).toEqual({
      record_id: 1,
      base_value: 200,
      factors: [
        { name: 'VehAge', operation: 'multiply', value: 1.3, running_total: 260 },
        { name: 'DrivAge', operation: 'multiply', value: 1.2, running_total: 312 },
        { name: 'PowerGroup', operation: 'multiply', value: 1, running_total: 312 },
      ],
      final_premium: 312,
    });
  });

  it('matches the separate transform and rate steps', async () => {
    const context = await pricer.load(configDir, { primaryKey: 'IDpol', transforms: [powerGroup] });
    const premium = rate(transformRecord(sampleQuote, context), context.rating, 1);
    expect(pricer.price(sampleQuote, context).premium).toEqual(premium);
    expect(pricer.transform(sampleQuote, context)).toEqual(pricer.price(sampleQuote, context).transformed);
  });

  it('prices the individual record directory', async () => {
    const context = await pricer.load(configDir, { primaryKey: 'IDpol', transforms: [powerGroup] });
    const quotes = await pricer.quotes(path.join(exampleDir, 'data/individual'), { primaryKey: 'IDpol' });
    const result = await pricer.priceBatch(quotes, context);

    expect(quotes.columns).toContain('Exposure');
    expect(quotes.rows[0].Exposure).toBeNull();
    expect(result.results.map((r) => (r.ok ? r.premium.final_premium : r.error.kind))).toEqual([312, 269.28]);
    expect(result.results.map((r) => (r.ok ? r.transformed.PowerGroup : undefined))).toEqual(['Medium', 'High']);
  });

  it('surfaces a typed error for an unknown category', async () => {
    const context = await pricer.load(configDir, { primaryKey: 'IDpol', transforms: [powerGroup] });
    expect(() => pricer.price({ ...sampleQuote, VehBrand: 'B99' }, context)).toThrow(TransformationError);
  });
});

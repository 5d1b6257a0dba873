/**
 * Motor Pricing Example
 *
 * Loads the motor configuration, prices the individual quotes and then
 * prices a CSV batch that contains one unmapped vehicle brand.
 *
 * Run with: npx tsx example/motor/index.ts
 */

import 'dotenv/config';

import * as path from 'path';
import { fileURLToPath } from 'url';
import { pricer, powerGroup, PricingError } from '../../src/index.js';

const here = path.dirname(fileURLToPath(import.meta.url));

async function main() {
  const context = await pricer.load(path.join(here, 'config'), {
    transforms: [powerGroup],
    verbose: true,
  });

  // Single quotes: errors propagate
  const individual = await pricer.quotes(path.join(here, 'data', 'individual'));
  for (const quote of individual.rows) {
    const { recordId, premium } = pricer.price(quote, context);
    console.log(`\nQuote ${String(recordId)}: base ${premium.base_value}`);
    for (const step of premium.factors) {
      console.log(`  ${step.operation} ${step.name} ${step.value} -> ${step.running_total}`);
    }
    console.log(`  final premium ${premium.final_premium}`);
  }

  // Batch: failures are collected per record
  const batch = await pricer.quotes(path.join(here, 'data', 'batch', 'quotes.csv'));
  await pricer.priceBatch(batch, context, { showProgress: true });
}

main().catch((error) => {
  if (error instanceof PricingError) {
    console.error(`${error.kind}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});

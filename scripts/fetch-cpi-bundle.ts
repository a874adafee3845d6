/**
 * Fetches one CPI bundle from the live sources and prints a summary.
 *
 * Usage: tsx scripts/fetch-cpi-bundle.ts [COUNTRY...] [--start YYYY-MM-DD]
 */

import dotenv from 'dotenv';

import { buildCpiSystem } from '../src/app/build-cpi-system.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { compareCountryWeights } from '../src/modules/weights/index.js';

import type { CompleteCpiBundle } from '../src/modules/cpi-bundle/index.js';

dotenv.config();

interface CliArgs {
  countries: string[];
  startDate: string | undefined;
}

const parseArgs = (argv: readonly string[]): CliArgs => {
  const countries: string[] = [];
  let startDate: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === '--start') {
      startDate = argv[i + 1];
      i++;
      continue;
    }
    countries.push(arg.toUpperCase());
  }

  return { countries, startDate };
};

const printSummary = (bundle: CompleteCpiBundle, primaryCountry: string): void => {
  const rowsByCountry = new Map<string, { rows: number; first: string; last: string }>();
  for (const row of bundle.cpi) {
    const entry = rowsByCountry.get(row.country);
    if (entry === undefined) {
      rowsByCountry.set(row.country, { rows: 1, first: row.date, last: row.date });
    } else {
      entry.rows++;
      entry.last = row.date;
    }
  }

  console.log('\nIndex series:');
  for (const [country, { rows, first, last }] of rowsByCountry) {
    console.log(`  ${country}: ${String(rows)} rows, ${first} to ${last}`);
  }

  console.log('\nAnnualized rate of change:');
  for (const [country, cells] of Object.entries(bundle.roc)) {
    const formatted = Object.entries(cells)
      .map(([period, rate]) =>
        rate === null ? `${period} n/a` : `${period} ${rate.times(100).toFixed(2)}%`
      )
      .join(', ');
    console.log(`  ${country}: ${formatted}`);
  }

  if (bundle.weights.length === 0) {
    console.log('\nWeights: none');
    return;
  }

  const latestYear = Math.max(...bundle.weights.map((row) => row.year));
  console.log(`\nWeights: ${String(bundle.weights.length)} rows, latest year ${String(latestYear)}`);

  const others = [...new Set(bundle.weights.map((row) => row.country))].filter(
    (country) => country !== primaryCountry
  );
  for (const other of others) {
    const [largest] = compareCountryWeights(bundle.weights, {
      country: primaryCountry,
      otherCountry: other,
      year: latestYear,
    });
    if (largest === undefined) continue;
    console.log(
      `  ${primaryCountry} vs ${other}, heaviest ${primaryCountry} category: ${largest.category} (${largest.weight.toString()} vs ${largest.otherWeight.toString()})`
    );
  }
};

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger(config.logger);
  const { loader } = buildCpiSystem({ config, logger });

  const args = parseArgs(process.argv.slice(2));
  const primaryCountry = config.routing.primaryCountry;
  const countries = args.countries.length > 0 ? args.countries : [primaryCountry, 'DE', 'FR'];

  const result = await loader.load({
    countries,
    ...(args.startDate !== undefined && { startDate: args.startDate }),
  });

  if (result.isErr()) {
    console.error(`Failed to build CPI bundle (${result.error.type}): ${result.error.message}`);
    process.exit(1);
  }

  printSummary(result.value, primaryCountry);
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});

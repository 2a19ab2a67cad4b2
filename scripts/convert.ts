/**
 * Conversion Script
 * Prints converted values, the 30-day trend of the first target and the
 * rate table for every selected currency.
 *
 * Usage: npx tsx scripts/convert.ts --base USD --to EUR,GBP --amount 10 [--days 30] [--swap]
 */

// Must come first: the logger reads LOG_LEVEL when it is imported
import './load_env';
import { describeCurrency, findCurrency, getConfig, type AppConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { createRateSource } from '../src/providers/registry';
import { createCycleDependencies, runConversionCycle } from '../src/rates/cycle';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('convert');

interface ConvertCliArgs {
  base: string;
  targets: string[];
  amount: number;
  windowDays: number;
  swap: boolean;
}

function readFlag(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);
  const posIndex = process.argv.findIndex((arg) => arg === name);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

function parseCliArgs(config: AppConfig): ConvertCliArgs {
  const toValue = readFlag('--to');
  const amountValue = readFlag('--amount');
  const daysValue = readFlag('--days');

  return {
    base: readFlag('--base') ?? config.defaultBase,
    targets: toValue !== undefined ? toValue.split(',').filter(Boolean) : config.defaultTargets,
    amount: amountValue !== undefined ? Number(amountValue) : config.defaultAmount,
    windowDays: daysValue !== undefined ? Number(daysValue) : config.windowDays,
    swap: process.argv.includes('--swap'),
  };
}

function warnOffMenu(config: AppConfig, args: ConvertCliArgs): void {
  const offMenu = [args.base, ...args.targets].filter((code) => !findCurrency(config, code));
  if (offMenu.length > 0) {
    logger.warn({ codes: offMenu }, 'Currencies outside the configured menu');
  }
}

async function main(): Promise<number> {
  const config = getConfig();
  const args = parseCliArgs(config);
  warnOffMenu(config, args);
  const env = getEnvConfig();
  const source = createRateSource({ env });
  const deps = createCycleDependencies(source, env.historyConcurrency);

  const outcome = await runConversionCycle(
    { base: args.base, targets: args.targets, amount: args.amount },
    deps,
    { swap: args.swap, windowDays: args.windowDays }
  );

  if (outcome.status === 'error') {
    console.error(`Could not fetch rates (${outcome.error.kind}): ${outcome.error.message}`);
    return 1;
  }

  const { request, snapshot, conversions, history, table } = outcome;

  console.log('\nConversion Results');
  if (request.targets.length === 0) {
    console.log('Select at least one target currency to convert to.');
  }
  for (const card of conversions) {
    console.log(`  ${card.label}: ${card.value}  (${card.rateLabel})`);
  }
  if (snapshot.missing.length > 0) {
    console.log(`  Some currencies not found: ${snapshot.missing.join(', ')}`);
  }

  if (history && conversions.length > 0) {
    const first = conversions[0].target;
    console.log(
      `\nLast ${args.windowDays} Days: ${describeCurrency(config, request.base)} → ${describeCurrency(config, first)}`
    );
    for (const observation of history.series[first]) {
      console.log(`  ${observation.date}  ${observation.rate.toFixed(4)}`);
    }
    if (history.failedFetches > 0) {
      console.log(`  (${history.failedFetches} of ${history.dates.length} days unavailable)`);
    }
  }

  if (table && conversions.length > 1) {
    const codes = conversions.map((card) => card.target);
    console.log(`\nLast ${args.windowDays} Days: All Selected Currencies`);
    console.log(`  ${'Date'.padEnd(10)}  ${codes.map((code) => code.padStart(12)).join(' ')}`);
    for (const row of table) {
      const cells = codes.map((code) => {
        const rate = row.rates[code];
        return (rate === null || rate === undefined ? '-' : rate.toFixed(4)).padStart(12);
      });
      console.log(`  ${row.date}  ${cells.join(' ')}`);
    }
  }

  logger.debug({ requests: source.getRequestCount() }, 'Conversion finished');
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error({ error }, 'Conversion failed');
    process.exitCode = 1;
  });

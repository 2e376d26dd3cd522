#!/usr/bin/env node

import chalk from 'chalk';
import { Command, InvalidArgumentError, Option } from 'commander';
import dotenv from 'dotenv';
import fs from 'fs';
import { pathToFileURL } from 'url';

// Load environment variables
dotenv.config({ path: '.env.local' });
dotenv.config(); // fallback to .env

import { scanBreakoutRetests } from './patterns/breakout-retest.js';
import { type Bar, type Signal } from './patterns/types.js';
import {
  DEFAULT_ATR_LOOKBACK,
  latestDefinedValue,
  prepareIndicators,
} from './utils/atr-calculator.js';
import { formatPrice } from './utils/calculations.js';
import {
  CONFIG_FILE_NAME,
  createDefaultConfigFile,
  loadConfig,
  mergeConfigWithCliOptions,
  type CliOptions,
} from './utils/config.js';
import { loadBarsFromCsv, prepareSeries, resolveDataPath } from './utils/data-loader.js';
import { InvalidInputError } from './utils/errors.js';
import {
  printFooter,
  printHeader,
  printNoMatches,
  printSignalDetails,
  printSummary,
  summarizeSignals,
  writeSignalsCsv,
  type ScanHeaderInfo,
} from './utils/output.js';
import { invertLevel, invertSeries } from './utils/series-inversion.js';

export interface ScanRun {
  signals: Signal[];
  /** Level the scan ran against (inverted when the series was) */
  level: number;
  /** Bars the scan ran over */
  bars: Bar[];
}

/**
 * Load, prepare, optionally invert, scan, report and export in one pass.
 */
export const runScan = (cliOptions: CliOptions): ScanRun => {
  const config = mergeConfigWithCliOptions(loadConfig(cliOptions.config), cliOptions);
  const { parameters, debug } = config;

  const csvPath =
    config.csvPath ?? resolveDataPath(config.dataDir, config.ticker, config.timeframe);
  const loaded = loadBarsFromCsv(csvPath);

  if (debug) {
    console.log(
      chalk.dim(
        `DEBUG - Loaded ${loaded.rowsRead} rows from ${csvPath} (${loaded.rowsDropped} dropped)`
      )
    );
  }
  if (loaded.rowsDropped > 0) {
    console.warn(
      chalk.yellow(`Dropped ${loaded.rowsDropped} of ${loaded.rowsRead} rows with missing prices`)
    );
  }

  const prepared = prepareSeries(loaded.bars, {
    from: config.from,
    to: config.to,
    resampleMinutes: config.resampleMinutes,
  });
  if (prepared.length < 2) {
    throw new InvalidInputError(
      `at least 2 bars are required after preparation, got ${prepared.length}`,
      'series'
    );
  }

  let bars = prepared;
  let level = config.level;
  let inversion: ScanHeaderInfo['inversion'];

  if (config.invert) {
    const inverted = invertSeries(prepared, config.invert);
    bars = inverted.bars;
    level = invertLevel(config.level, config.invert, inverted.pivot);
    inversion = { mode: config.invert, pivot: inverted.pivot, originalLevel: config.level };
  }

  const atrLookback = parameters.atrLookback ?? DEFAULT_ATR_LOOKBACK;
  const indicators = parameters.atrEnabled ? prepareIndicators(bars, atrLookback) : undefined;

  if (debug) {
    console.log(
      chalk.dim(
        `DEBUG - Prepared ${bars.length} bars: ${bars[0].timestamp} → ${bars[bars.length - 1].timestamp}`
      )
    );
    const latestAtr = indicators ? latestDefinedValue(indicators) : undefined;
    if (latestAtr !== undefined) {
      console.log(chalk.dim(`DEBUG - Latest ATR(${atrLookback}): ${formatPrice(latestAtr)}`));
    }
  }

  const signals = scanBreakoutRetests(bars, level, parameters, indicators);

  printHeader({
    ticker: config.ticker,
    timeframe: config.timeframe,
    level,
    parameters,
    barCount: bars.length,
    firstTimestamp: bars[0].timestamp,
    lastTimestamp: bars[bars.length - 1].timestamp,
    inversion,
  });

  signals.forEach((signal, index) => printSignalDetails(signal, index + 1));

  const summary = summarizeSignals(signals);
  if (summary) {
    printSummary(summary);
  } else {
    printNoMatches();
  }

  if (config.exportCsv) {
    writeSignalsCsv(signals, config.exportCsv);
    console.log(chalk.green(`\nExported ${signals.length} signals to ${config.exportCsv}`));
  }

  printFooter();

  return { signals, level, bars };
};

const parseNumberOption = (value: string): number => {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
};

const parseIntegerOption = (value: string): number => {
  const parsed = parseNumberOption(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
};

/**
 * Build the command line interface. The default action receives the parsed options.
 */
export const buildProgram = (onScan: (options: CliOptions) => void = runScan): Command => {
  const program = new Command();

  program
    .name('level-retest')
    .description('Scan a price series for breakout → retest → takeoff sequences around a level')
    .version('1.0.0')
    .option('--config <path>', `Configuration file (default: ${CONFIG_FILE_NAME})`)
    .option('--csv <path>', 'CSV file of bars; overrides ticker, timeframe and data dir')
    .option('--ticker <symbol>', 'Ticker symbol to scan')
    .option('--timeframe <name>', 'Bar timeframe (e.g., 60min, 1d)')
    .option('--data-dir <dir>', 'Directory holding <ticker>/<timeframe>.csv files')
    .option('--from <date>', 'Start date (YYYY-MM-DD)')
    .option('--to <date>', 'End date (YYYY-MM-DD)')
    .option('--resample <minutes>', 'Aggregate bars into N-minute buckets', parseIntegerOption)
    .option('--level <price>', 'Price level to scan around', parseNumberOption)
    .option('--tolerance <fraction>', 'Retest band as a fraction of the level', parseNumberOption)
    .option('--max-retest-window <bars>', 'Bars allowed from breakout to retest', parseIntegerOption)
    .option('--takeoff-window <bars>', 'Bars allowed from retest to takeoff', parseIntegerOption)
    .option('--takeoff-pct <fraction>', 'Minimum takeoff move above the level', parseNumberOption)
    .option('--atr', 'Use ATR in the takeoff threshold')
    .option('--no-atr', 'Use only the percentage takeoff threshold')
    .option('--atr-mult <n>', 'ATR multiplier for the takeoff threshold', parseNumberOption)
    .option('--atr-lookback <bars>', 'ATR averaging window', parseIntegerOption)
    .addOption(
      new Option('--invert <method>', 'Scan the inverted series (breakdowns)').choices([
        'mirror',
        'negate',
      ])
    )
    .option('--export <path>', 'Write signals to a CSV file')
    .option('--debug', 'Show debug information');

  program
    .command('init')
    .description('Create default configuration file')
    .action(() => {
      const configPath = createDefaultConfigFile();
      if (configPath) {
        console.log(chalk.green(`Created default configuration file: ${configPath}`));
      } else {
        console.log(`${CONFIG_FILE_NAME} already exists; leaving it unchanged.`);
      }
    });

  program.action(() => {
    onScan(program.opts<CliOptions>());
  });

  return program;
};

const main = async () => {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    if (process.env.NODE_ENV !== 'test' && !process.env.VITEST) {
      process.exit(1);
    }
  }
};

/**
 * Whether `moduleUrl` is the script node was started with. npm installs the bin as a
 * symlink, so the argv path is resolved to its real location first.
 */
export const isEntryPoint = (moduleUrl: string, argvPath: string | undefined): boolean => {
  if (!argvPath || !fs.existsSync(argvPath)) {
    return false;
  }
  return moduleUrl === pathToFileURL(fs.realpathSync(argvPath)).href;
};

// Only run main if this script is executed directly (not imported)
if (isEntryPoint(import.meta.url, process.argv[1])) {
  void main();
}

import fs from 'fs';
import path from 'path';

import yaml from 'js-yaml';
import { z } from 'zod';

import { DEFAULT_SCAN_PARAMETERS } from '../patterns/breakout-retest.js';
import { InversionMode, ScanParameters } from '../patterns/types.js';

import { InvalidInputError } from './errors.js';

export const CONFIG_FILE_NAME = 'level-retest.config.yaml';

const DateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format');

// Where bars come from and how the series is trimmed before scanning
const DataConfigSchema = z.object({
  ticker: z.string().default('BTC-USD'),
  timeframe: z.string().default('60min'),
  dataDir: z.string().optional(),
  from: DateSchema.optional(),
  to: DateSchema.optional(),
  resampleMinutes: z.number().int().positive().optional(),
});

const AtrConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_SCAN_PARAMETERS.atrEnabled),
  multiplier: z.number().default(DEFAULT_SCAN_PARAMETERS.atrMult),
  lookback: z.number().int().positive().default(14),
});

const ScanConfigSchema = z.object({
  level: z.number(),
  tolerance: z.number().positive().default(DEFAULT_SCAN_PARAMETERS.tolerance),
  maxRetestWindow: z.number().int().positive().default(DEFAULT_SCAN_PARAMETERS.maxRetestWindow),
  takeoffWindow: z.number().int().positive().default(DEFAULT_SCAN_PARAMETERS.takeoffWindow),
  takeoffPct: z.number().nonnegative().default(DEFAULT_SCAN_PARAMETERS.takeoffPct),
  atr: AtrConfigSchema.default({}),
});

const InvertConfigSchema = z.object({
  enabled: z.boolean().default(false),
  method: z.enum(['mirror', 'negate']).default('mirror'),
});

const OutputConfigSchema = z.object({
  exportCsv: z.string().optional(),
});

const ConfigSchema = z.object({
  data: DataConfigSchema.default({}),
  scan: ScanConfigSchema,
  invert: InvertConfigSchema.default({}),
  output: OutputConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration when no config file exists
 */
export const DEFAULT_CONFIG: Config = {
  data: {
    ticker: 'BTC-USD',
    timeframe: '60min',
  },
  scan: {
    level: 60000,
    tolerance: 0.001,
    maxRetestWindow: 20,
    takeoffWindow: 20,
    takeoffPct: 0.005,
    atr: {
      enabled: true,
      multiplier: 1.0,
      lookback: 14,
    },
  },
  invert: {
    enabled: false,
    method: 'mirror',
  },
  output: {},
};

/**
 * Validate a parsed YAML document against the config schema
 */
export const parseConfig = (configData: unknown): Config => {
  return ConfigSchema.parse(configData);
};

/**
 * Load configuration from a YAML file
 *
 * @param configPath - Path to the configuration file
 * @returns Validated configuration object, or the defaults if no file exists
 * @throws InvalidInputError when the file exists but is not valid YAML or fails validation
 */
export const loadConfig = (configPath?: string): Config => {
  const defaultConfigPath = path.join(process.cwd(), CONFIG_FILE_NAME);
  const configFilePath = configPath || process.env.LEVEL_RETEST_CONFIG || defaultConfigPath;

  if (!fs.existsSync(configFilePath)) {
    console.log(`Using default configuration as ${configFilePath} was not found.`);
    return DEFAULT_CONFIG;
  }

  let configData: unknown;
  try {
    configData = yaml.load(fs.readFileSync(configFilePath, 'utf8'));
  } catch (error) {
    throw new InvalidInputError(
      `cannot read ${configFilePath}: ${error instanceof Error ? error.message : String(error)}`,
      'config'
    );
  }

  const result = ConfigSchema.safeParse(configData);
  if (!result.success) {
    console.error('Invalid configuration file:');
    result.error.issues.forEach(issue => {
      console.error(`- ${issue.path.join('.')}: ${issue.message}`);
    });
    const [firstIssue] = result.error.issues;
    throw new InvalidInputError(
      `${firstIssue.message} (in ${configFilePath})`,
      firstIssue.path.join('.') || 'config'
    );
  }
  return result.data;
};

/**
 * Creates a default configuration file if none exists
 *
 * @returns Path of the file, or undefined when one was already there
 */
export const createDefaultConfigFile = (directory: string = process.cwd()): string | undefined => {
  const configPath = path.join(directory, CONFIG_FILE_NAME);

  if (fs.existsSync(configPath)) {
    return undefined;
  }

  const completeDefaultConfig: z.input<typeof ConfigSchema> = {
    ...DEFAULT_CONFIG,
    data: { ...DEFAULT_CONFIG.data, dataDir: 'tickers' },
    output: { exportCsv: 'retest_signals.csv' },
  };

  const yamlContent = yaml.dump(completeDefaultConfig, {
    indent: 2,
    lineWidth: 100,
    quotingType: '"',
  });

  fs.writeFileSync(configPath, yamlContent, 'utf8');
  return configPath;
};

/**
 * Options as commander hands them over; every field is optional and overrides the file.
 */
export type CliOptions = {
  config?: string;
  csv?: string;
  ticker?: string;
  timeframe?: string;
  dataDir?: string;
  from?: string;
  to?: string;
  resample?: number;
  level?: number;
  tolerance?: number;
  maxRetestWindow?: number;
  takeoffWindow?: number;
  takeoffPct?: number;
  atr?: boolean;
  atrMult?: number;
  atrLookback?: number;
  invert?: InversionMode;
  export?: string;
  debug?: boolean;
};

/**
 * Flattened run configuration after CLI overrides
 */
export interface MergedConfig {
  ticker: string;
  timeframe: string;
  dataDir: string;
  csvPath?: string;
  from?: string;
  to?: string;
  resampleMinutes?: number;
  level: number;
  parameters: ScanParameters;
  invert?: InversionMode;
  exportCsv?: string;
  debug: boolean;
}

/**
 * Merge CLI options with configuration file
 *
 * @param loadedConfig - The loaded configuration
 * @param cliOptions - Command line options
 * @returns Merged configuration
 */
export const mergeConfigWithCliOptions = (
  loadedConfig: Config,
  cliOptions: CliOptions
): MergedConfig => {
  const { data, scan, invert, output } = loadedConfig;

  return {
    ticker: cliOptions.ticker ?? data.ticker,
    timeframe: cliOptions.timeframe ?? data.timeframe,
    dataDir: cliOptions.dataDir ?? data.dataDir ?? process.env.LEVEL_RETEST_DATA_DIR ?? 'tickers',
    csvPath: cliOptions.csv,
    from: cliOptions.from ?? data.from,
    to: cliOptions.to ?? data.to,
    resampleMinutes: cliOptions.resample ?? data.resampleMinutes,
    level: cliOptions.level ?? scan.level,
    parameters: {
      tolerance: cliOptions.tolerance ?? scan.tolerance,
      maxRetestWindow: cliOptions.maxRetestWindow ?? scan.maxRetestWindow,
      takeoffWindow: cliOptions.takeoffWindow ?? scan.takeoffWindow,
      takeoffPct: cliOptions.takeoffPct ?? scan.takeoffPct,
      atrEnabled: cliOptions.atr ?? scan.atr.enabled,
      atrMult: cliOptions.atrMult ?? scan.atr.multiplier,
      atrLookback: cliOptions.atrLookback ?? scan.atr.lookback,
    },
    invert: cliOptions.invert ?? (invert.enabled ? invert.method : undefined),
    exportCsv: cliOptions.export ?? output.exportCsv,
    debug: cliOptions.debug ?? false,
  };
};

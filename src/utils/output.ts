import fs from 'fs';

import chalk from 'chalk';

import { InversionMode, ScanParameters, Signal } from '../patterns/types.js';

import {
  calculateMean,
  calculateMedian,
  calculateStdDev,
  formatPercent,
  formatPrice,
} from './calculations.js';

export interface ScanHeaderInfo {
  ticker: string;
  timeframe: string;
  level: number;
  parameters: ScanParameters;
  barCount: number;
  firstTimestamp?: string;
  lastTimestamp?: string;
  inversion?: {
    mode: InversionMode;
    pivot: number;
    originalLevel: number;
  };
}

export interface SignalSummary {
  count: number;
  meanReturn: number;
  medianReturn: number;
  minReturn: number;
  maxReturn: number;
  stdDevReturn: number;
  meanBarsToRetest: number;
  meanBarsToTakeoff: number;
}

const SEPARATOR = '═══════════════════════════════════════════════════════════════════════';

export const SIGNAL_CSV_COLUMNS = [
  'breakout_index',
  'breakout_time',
  'retest_index',
  'retest_time',
  'takeoff_index',
  'takeoff_time',
  'level',
  'retest_low',
  'takeoff_close',
  'return_from_level',
  'bars_to_retest',
  'bars_to_takeoff',
  'atr_at_takeoff',
] as const satisfies ReadonlyArray<keyof Signal>;

export const printHeader = (info: ScanHeaderInfo) => {
  const { parameters } = info;
  const range =
    info.firstTimestamp && info.lastTimestamp
      ? ` (${info.firstTimestamp} to ${info.lastTimestamp})`
      : '';

  console.log(chalk.bold(`\n${info.ticker} ${info.timeframe} Breakout → Retest Scan${range}:`));
  console.log(chalk.bold(`Level: ${formatPrice(info.level)} | Bars: ${info.barCount}`));

  if (info.inversion) {
    const { mode, pivot, originalLevel } = info.inversion;
    const pivotText = mode === 'mirror' ? ` around ${formatPrice(pivot)}` : '';
    console.log(
      chalk.dim(`Inverted (${mode}${pivotText}); original level ${formatPrice(originalLevel)}`)
    );
  }

  const takeoffRule = parameters.atrEnabled
    ? `max(${formatPercent(parameters.takeoffPct)}, ${parameters.atrMult}x ATR${
        parameters.atrLookback ? `(${parameters.atrLookback})` : ''
      })`
    : formatPercent(parameters.takeoffPct);
  console.log(
    chalk.bold(
      `Tolerance: ±${formatPercent(parameters.tolerance)} | Retest Window: ${parameters.maxRetestWindow} bars | Takeoff Window: ${parameters.takeoffWindow} bars | Takeoff: ${takeoffRule}`
    )
  );
  console.log('');
  console.log(chalk.gray(SEPARATOR));
  console.log('');
};

export const printSignalDetails = (signal: Signal, ordinal: number) => {
  const returnText = formatPercent(signal.return_from_level);
  const coloredReturn =
    signal.return_from_level >= 0 ? chalk.green(returnText) : chalk.red(returnText);
  const atrText =
    signal.atr_at_takeoff !== null ? chalk.dim(` ATR: ${formatPrice(signal.atr_at_takeoff)}`) : '';

  console.log(
    `#${ordinal} ↗️ Breakout ${signal.breakout_time} → Retest ${signal.retest_time} (+${signal.bars_to_retest}) → Takeoff ${signal.takeoff_time} (+${signal.bars_to_takeoff}) Low: ${formatPrice(signal.retest_low)} Close: ${formatPrice(signal.takeoff_close)} ${coloredReturn}${atrText}`
  );
};

/**
 * Aggregate statistics over the returns and timings of a signal set.
 * Returns undefined for an empty set.
 */
export const summarizeSignals = (signals: readonly Signal[]): SignalSummary | undefined => {
  if (signals.length === 0) {
    return undefined;
  }

  const returns = signals.map(s => s.return_from_level);
  const meanReturn = calculateMean(returns);

  return {
    count: signals.length,
    meanReturn,
    medianReturn: calculateMedian(returns),
    minReturn: Math.min(...returns),
    maxReturn: Math.max(...returns),
    stdDevReturn: calculateStdDev(returns, meanReturn),
    meanBarsToRetest: calculateMean(signals.map(s => s.bars_to_retest)),
    meanBarsToTakeoff: calculateMean(signals.map(s => s.bars_to_takeoff)),
  };
};

export const printSummary = (summary: SignalSummary) => {
  const meanColor = summary.meanReturn >= 0 ? chalk.green : chalk.red;
  const medianColor = summary.medianReturn >= 0 ? chalk.green : chalk.red;

  let summaryString = `📊 Signals: ${summary.count} | `;
  summaryString += `Return Range: ${formatPercent(summary.minReturn)} to ${formatPercent(summary.maxReturn)} | `;
  summaryString += `Mean: ${meanColor(formatPercent(summary.meanReturn))} | Median: ${medianColor(formatPercent(summary.medianReturn))} | StdDev: ${chalk.gray(formatPercent(summary.stdDevReturn))}`;

  console.log('');
  console.log(chalk.cyan(summaryString));
  console.log(
    chalk.cyan(
      `⏱️  Avg bars to retest: ${summary.meanBarsToRetest.toFixed(1)} | Avg bars to takeoff: ${summary.meanBarsToTakeoff.toFixed(1)}`
    )
  );
};

export const printNoMatches = () => {
  console.log(
    chalk.gray('No breakout → retest → takeoff sequences found with the current settings.')
  );
};

export const printFooter = () => {
  console.log('\n');
  console.log(chalk.gray(SEPARATOR));
};

const formatCsvCell = (value: string | number | null): string => {
  if (value === null) {
    return '';
  }
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

/**
 * One header row followed by one row per signal, columns in Signal field order.
 */
export const formatSignalsCsv = (signals: readonly Signal[]): string => {
  const lines = [SIGNAL_CSV_COLUMNS.join(',')];
  for (const signal of signals) {
    lines.push(SIGNAL_CSV_COLUMNS.map(column => formatCsvCell(signal[column])).join(','));
  }
  return `${lines.join('\n')}\n`;
};

export const writeSignalsCsv = (signals: readonly Signal[], filePath: string): void => {
  fs.writeFileSync(filePath, formatSignalsCsv(signals), 'utf-8');
};

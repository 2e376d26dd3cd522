import fs from 'fs';
import path from 'path';

import { parse } from 'csv-parse/sync';

import { Bar } from '../patterns/types.js';

import { bucketStart, isWithinDateRange, parseTimestamp } from './date-helpers.js';
import { InvalidInputError } from './errors.js';

export interface LoadedBars {
  bars: Bar[];
  rowsRead: number;
  rowsDropped: number;
}

export interface SeriesPreparationOptions {
  from?: string;
  to?: string;
  resampleMinutes?: number;
}

type CsvRecord = Record<string, string>;

const TIMESTAMP_COLUMNS = ['timestamp', 'datetime', 'date'];

/**
 * Location of a ticker's bar file: <dataDir>/<ticker>/<timeframe>.csv
 */
export const resolveDataPath = (dataDir: string, ticker: string, timeframe: string): string => {
  return path.join(dataDir, ticker, `${timeframe}.csv`);
};

const lowerCaseKeys = (record: CsvRecord): CsvRecord => {
  const normalized: CsvRecord = {};
  for (const [key, value] of Object.entries(record)) {
    normalized[key.trim().toLowerCase()] = value;
  }
  return normalized;
};

const recordTimestamp = (record: CsvRecord, timestampColumn: string): string => {
  const value = record[timestampColumn].trim();
  // Separate Date and Time columns, as exported by some charting tools
  if (timestampColumn === 'date' && record.time) {
    return `${value} ${record.time.trim()}`;
  }
  return value;
};

/**
 * Convert parsed CSV records into bars. Rows with a non-finite open, high, low or close
 * are dropped, the way a provider download is cleaned before use.
 */
export const parseBarRecords = (records: CsvRecord[]): LoadedBars => {
  if (records.length === 0) {
    return { bars: [], rowsRead: 0, rowsDropped: 0 };
  }

  const rows = records.map(lowerCaseKeys);
  const columns = Object.keys(rows[0]);
  const timestampColumn = TIMESTAMP_COLUMNS.find(column => columns.includes(column));
  if (!timestampColumn) {
    throw new InvalidInputError(
      `expected one of ${TIMESTAMP_COLUMNS.join(', ')} in the header, got ${columns.join(', ')}`,
      'csv'
    );
  }
  for (const column of ['open', 'high', 'low', 'close']) {
    if (!columns.includes(column)) {
      throw new InvalidInputError(`missing required column "${column}"`, 'csv');
    }
  }

  const bars: Bar[] = [];
  for (const row of rows) {
    const bar: Bar = {
      timestamp: recordTimestamp(row, timestampColumn),
      open: parseFloat(row.open),
      high: parseFloat(row.high),
      low: parseFloat(row.low),
      close: parseFloat(row.close),
    };
    if (row.volume !== undefined && row.volume.trim() !== '') {
      bar.volume = parseFloat(row.volume);
    }

    if ([bar.open, bar.high, bar.low, bar.close].every(Number.isFinite)) {
      bars.push(bar);
    }
  }

  return { bars, rowsRead: records.length, rowsDropped: records.length - bars.length };
};

/**
 * Load bars from a CSV file with a header row.
 *
 * @param csvPath - Path to the CSV file
 * @returns Parsed bars in file order, plus read/dropped row counts
 */
export const loadBarsFromCsv = (csvPath: string): LoadedBars => {
  if (!fs.existsSync(csvPath)) {
    throw new InvalidInputError(`file not found: ${csvPath}`, 'csv');
  }

  const csvData = fs.readFileSync(csvPath, 'utf8');
  const records: CsvRecord[] = parse(csvData, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });

  return parseBarRecords(records);
};

/**
 * Aggregate bars into N-minute buckets: first open, highest high, lowest low, last close,
 * summed volume. Each bucket keeps the timestamp of its first bar.
 */
export const resampleBars = (bars: Bar[], minutes: number): Bar[] => {
  if (!Number.isInteger(minutes) || minutes <= 0) {
    throw new InvalidInputError(`must be a positive integer, got ${minutes}`, 'resampleMinutes');
  }

  const buckets = new Map<number, Bar>();

  for (const bar of bars) {
    const key = bucketStart(parseTimestamp(bar.timestamp), minutes);
    const existing = buckets.get(key);

    if (!existing) {
      buckets.set(key, { ...bar });
      continue;
    }

    existing.high = Math.max(existing.high, bar.high);
    existing.low = Math.min(existing.low, bar.low);
    existing.close = bar.close;
    if (bar.volume !== undefined) {
      existing.volume = (existing.volume ?? 0) + bar.volume;
    }
  }

  // Map iteration follows insertion order, which is time order for sorted input
  return Array.from(buckets.values());
};

/**
 * Turn raw provider bars into a scan-ready series: ascending timestamps, one bar per
 * timestamp (the last row wins), trimmed to the requested dates and optionally resampled.
 */
export const prepareSeries = (bars: Bar[], options: SeriesPreparationOptions = {}): Bar[] => {
  const byTime = new Map<number, Bar>();
  for (const bar of bars) {
    byTime.set(parseTimestamp(bar.timestamp), bar);
  }

  const ordered = Array.from(byTime.entries())
    .filter(([time]) => isWithinDateRange(time, options.from, options.to))
    .sort(([a], [b]) => a - b)
    .map(([, bar]) => bar);

  return options.resampleMinutes ? resampleBars(ordered, options.resampleMinutes) : ordered;
};

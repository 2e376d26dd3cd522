import fs from 'fs';
import os from 'os';
import path from 'path';

import { parse } from 'csv-parse/sync';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { DEFAULT_SCAN_PARAMETERS } from '../patterns/breakout-retest.js';
import { Signal } from '../patterns/types.js';

import {
  formatSignalsCsv,
  printFooter,
  printHeader,
  printNoMatches,
  printSignalDetails,
  printSummary,
  summarizeSignals,
  writeSignalsCsv,
} from './output.js';

// Mock chalk to prevent styling in tests
vi.mock('chalk', () => ({
  default: {
    bold: (text: string) => text,
    green: (text: string) => text,
    red: (text: string) => text,
    cyan: (text: string) => text,
    gray: (text: string) => text,
    dim: (text: string) => text,
  },
}));

const firstSignal: Signal = {
  breakout_index: 1,
  breakout_time: '2024-01-01 01:00',
  retest_index: 3,
  retest_time: '2024-01-01 03:00',
  takeoff_index: 4,
  takeoff_time: '2024-01-01 04:00',
  level: 100,
  retest_low: 100.4,
  takeoff_close: 103.5,
  return_from_level: 0.035,
  bars_to_retest: 2,
  bars_to_takeoff: 1,
  atr_at_takeoff: null,
};

const secondSignal: Signal = {
  breakout_index: 10,
  breakout_time: '2024-01-01 10:00',
  retest_index: 11,
  retest_time: '2024-01-01 11:00',
  takeoff_index: 15,
  takeoff_time: '2024-01-01 15:00',
  level: 100,
  retest_low: 99.95,
  takeoff_close: 101,
  return_from_level: 0.01,
  bars_to_retest: 1,
  bars_to_takeoff: 4,
  atr_at_takeoff: 1.25,
};

describe('output utilities', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('printHeader', () => {
    it('should print the run and its parameters', () => {
      printHeader({
        ticker: 'BTC-USD',
        timeframe: '60min',
        level: 60000,
        parameters: DEFAULT_SCAN_PARAMETERS,
        barCount: 500,
        firstTimestamp: '2024-01-01 00:00:00',
        lastTimestamp: '2024-01-21 19:00:00',
      });

      expect(console.log).toHaveBeenCalledWith(
        '\nBTC-USD 60min Breakout → Retest Scan (2024-01-01 00:00:00 to 2024-01-21 19:00:00):'
      );
      expect(console.log).toHaveBeenCalledWith('Level: 60000.00 | Bars: 500');
      expect(console.log).toHaveBeenCalledWith(
        'Tolerance: ±0.10% | Retest Window: 20 bars | Takeoff Window: 20 bars | Takeoff: max(0.50%, 1x ATR(14))'
      );
    });

    it('should describe a mirrored series with its pivot', () => {
      printHeader({
        ticker: 'BTC-USD',
        timeframe: '60min',
        level: 64000,
        parameters: DEFAULT_SCAN_PARAMETERS,
        barCount: 10,
        inversion: { mode: 'mirror', pivot: 62000, originalLevel: 60000 },
      });

      expect(console.log).toHaveBeenCalledWith('\nBTC-USD 60min Breakout → Retest Scan:');
      expect(console.log).toHaveBeenCalledWith(
        'Inverted (mirror around 62000.00); original level 60000.00'
      );
    });

    it('should show only the percentage rule for a negated scan without ATR', () => {
      printHeader({
        ticker: 'SPY',
        timeframe: '5min',
        level: -450,
        parameters: { ...DEFAULT_SCAN_PARAMETERS, atrEnabled: false },
        barCount: 10,
        inversion: { mode: 'negate', pivot: 0, originalLevel: 450 },
      });

      expect(console.log).toHaveBeenCalledWith('Inverted (negate); original level 450.0000');
      expect(console.log).toHaveBeenCalledWith(
        'Tolerance: ±0.10% | Retest Window: 20 bars | Takeoff Window: 20 bars | Takeoff: 0.50%'
      );
    });
  });

  describe('printSignalDetails', () => {
    it('should print a signal without ATR', () => {
      printSignalDetails(firstSignal, 1);

      expect(console.log).toHaveBeenCalledWith(
        '#1 ↗️ Breakout 2024-01-01 01:00 → Retest 2024-01-01 03:00 (+2) → Takeoff 2024-01-01 04:00 (+1) Low: 100.4000 Close: 103.5000 3.50%'
      );
    });

    it('should append the ATR when the signal carries one', () => {
      printSignalDetails(secondSignal, 2);

      expect(console.log).toHaveBeenCalledWith(
        '#2 ↗️ Breakout 2024-01-01 10:00 → Retest 2024-01-01 11:00 (+1) → Takeoff 2024-01-01 15:00 (+4) Low: 99.9500 Close: 101.0000 1.00% ATR: 1.2500'
      );
    });
  });

  describe('summarizeSignals', () => {
    it('should return undefined for no signals', () => {
      expect(summarizeSignals([])).toBeUndefined();
    });

    it('should aggregate returns and timings', () => {
      const summary = summarizeSignals([firstSignal, secondSignal]);

      expect(summary?.count).toBe(2);
      expect(summary?.meanReturn).toBeCloseTo(0.0225, 10);
      expect(summary?.medianReturn).toBeCloseTo(0.0225, 10);
      expect(summary?.minReturn).toBe(0.01);
      expect(summary?.maxReturn).toBe(0.035);
      expect(summary?.stdDevReturn).toBeCloseTo(0.0176777, 6);
      expect(summary?.meanBarsToRetest).toBe(1.5);
      expect(summary?.meanBarsToTakeoff).toBe(2.5);
    });

    it('should report a zero standard deviation for a single signal', () => {
      expect(summarizeSignals([firstSignal])?.stdDevReturn).toBe(0);
    });
  });

  describe('printSummary', () => {
    it('should print returns and timings', () => {
      const summary = summarizeSignals([firstSignal, secondSignal]);
      expect(summary).toBeDefined();
      if (!summary) return;

      printSummary(summary);

      expect(console.log).toHaveBeenCalledWith(
        '📊 Signals: 2 | Return Range: 1.00% to 3.50% | Mean: 2.25% | Median: 2.25% | StdDev: 1.77%'
      );
      expect(console.log).toHaveBeenCalledWith(
        '⏱️  Avg bars to retest: 1.5 | Avg bars to takeoff: 2.5'
      );
    });
  });

  describe('printNoMatches and printFooter', () => {
    it('should print the no-match notice', () => {
      printNoMatches();

      expect(console.log).toHaveBeenCalledWith(
        'No breakout → retest → takeoff sequences found with the current settings.'
      );
    });

    it('should print a separator', () => {
      printFooter();

      expect(console.log).toHaveBeenCalledWith('\n');
      expect(console.log).toHaveBeenCalledTimes(2);
    });
  });

  describe('formatSignalsCsv', () => {
    it('should write a header and one row per signal in field order', () => {
      const csv = formatSignalsCsv([firstSignal, secondSignal]);

      expect(csv.split('\n')).toEqual([
        'breakout_index,breakout_time,retest_index,retest_time,takeoff_index,takeoff_time,level,retest_low,takeoff_close,return_from_level,bars_to_retest,bars_to_takeoff,atr_at_takeoff',
        '1,2024-01-01 01:00,3,2024-01-01 03:00,4,2024-01-01 04:00,100,100.4,103.5,0.035,2,1,',
        '10,2024-01-01 10:00,11,2024-01-01 11:00,15,2024-01-01 15:00,100,99.95,101,0.01,1,4,1.25',
        '',
      ]);
    });

    it('should write only the header for no signals', () => {
      expect(formatSignalsCsv([])).toBe(
        'breakout_index,breakout_time,retest_index,retest_time,takeoff_index,takeoff_time,level,retest_low,takeoff_close,return_from_level,bars_to_retest,bars_to_takeoff,atr_at_takeoff\n'
      );
    });

    it('should read back with csv-parse', () => {
      const records: Array<Record<string, string>> = parse(formatSignalsCsv([secondSignal]), {
        columns: true,
      });

      expect(records).toHaveLength(1);
      expect(records[0].takeoff_time).toBe('2024-01-01 15:00');
      expect(Number(records[0].return_from_level)).toBe(0.01);
      expect(Number(records[0].atr_at_takeoff)).toBe(1.25);
    });
  });

  describe('writeSignalsCsv', () => {
    it('should write the formatted CSV to disk', () => {
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'level-retest-output-'));
      const filePath = path.join(tempDir, 'signals.csv');

      try {
        writeSignalsCsv([firstSignal], filePath);
        expect(fs.readFileSync(filePath, 'utf-8')).toBe(formatSignalsCsv([firstSignal]));
      } finally {
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });
  });
});

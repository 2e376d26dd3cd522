import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, describe, it, expect, vi } from 'vitest';

import { buildProgram } from './index.js';
import { CONFIG_FILE_NAME, type CliOptions } from './utils/config.js';

const parseArgs = (args: string[]): CliOptions[] => {
  const received: CliOptions[] = [];
  const program = buildProgram(options => {
    received.push(options);
  });
  program.exitOverride().configureOutput({ writeErr: () => {}, writeOut: () => {} });
  program.parse(args, { from: 'user' });
  return received;
};

describe('level-retest CLI options', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should leave unset options undefined so the config file decides', () => {
    const [options] = parseArgs(['--level', '60000']);

    expect(options.level).toBe(60000);
    expect(options.atr).toBeUndefined();
    expect(options.invert).toBeUndefined();
    expect(options.debug).toBeUndefined();
    expect(options.tolerance).toBeUndefined();
  });

  it('should convert numeric options and map kebab-case names', () => {
    const [options] = parseArgs([
      '--tolerance',
      '0.01',
      '--max-retest-window',
      '5',
      '--takeoff-window',
      '7',
      '--takeoff-pct',
      '0.03',
      '--atr-mult',
      '1.5',
      '--atr-lookback',
      '10',
      '--resample',
      '15',
      '--data-dir',
      'bars',
      '--invert',
      'negate',
      '--debug',
    ]);

    expect(options).toMatchObject({
      tolerance: 0.01,
      maxRetestWindow: 5,
      takeoffWindow: 7,
      takeoffPct: 0.03,
      atrMult: 1.5,
      atrLookback: 10,
      resample: 15,
      dataDir: 'bars',
      invert: 'negate',
      debug: true,
    });
  });

  it('should support both --atr and --no-atr', () => {
    expect(parseArgs(['--atr'])[0].atr).toBe(true);
    expect(parseArgs(['--no-atr'])[0].atr).toBe(false);
  });

  it('should accept a negative level', () => {
    expect(parseArgs(['--level', '-450'])[0].level).toBe(-450);
  });

  it('should reject an unknown inversion method', () => {
    expect(() => parseArgs(['--invert', 'flip'])).toThrow();
  });

  it('should reject a non-numeric level', () => {
    expect(() => parseArgs(['--level', 'abc'])).toThrow();
  });

  it('should reject a fractional window', () => {
    expect(() => parseArgs(['--max-retest-window', '2.5'])).toThrow();
  });

  it('should create the config file on init without scanning', () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'level-retest-cli-'));
    vi.spyOn(process, 'cwd').mockReturnValue(tempDir);
    vi.spyOn(console, 'log').mockImplementation(() => {});

    try {
      const received = parseArgs(['init']);

      expect(received).toEqual([]);
      expect(fs.existsSync(path.join(tempDir, CONFIG_FILE_NAME))).toBe(true);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});

/**
 * QKD Telemetry - CLI Tests
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { HarnessErrorCode } from '../types/errors';
import { buildProgram } from '../cli';
import {
  ConsolidateOptionsSchema,
  SimulateOptionsSchema,
  parseOptions,
  toSimulationConfig,
} from '../cli/options';
import { ConfigurationError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';
import { tempDir } from './helpers';

beforeAll(() => setLogLevel('silent'));

describe('CLI options', () => {
  test('Numeric options accept exponent notation', () => {
    const options = parseOptions(SimulateOptionsSchema, {
      fault: 'qber',
      duration: '2e11',
      sampleInterval: '1e10',
      seed: '7',
      degradeMode: 'step',
    });

    expect(options.fault).toBe('qber');
    expect(toSimulationConfig(options)).toEqual({
      duration: 200_000_000_000,
      faultStart: 100_000_000_000,
      sampleInterval: 10_000_000_000,
      seed: 7,
      degradeMode: 'step',
    });
  });

  test('An explicit fault start is kept', () => {
    const options = parseOptions(SimulateOptionsSchema, { fault: 'trojan', faultStart: '0' });
    expect(toSimulationConfig(options)).toEqual({ duration: 1_000_000_000_000, faultStart: 0 });
  });

  test('Invalid values name the offending flag', () => {
    let error: unknown;
    try {
      parseOptions(SimulateOptionsSchema, { fault: 'qbert', duration: '-5', faultStart: '1.5' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.code).toBe(HarnessErrorCode.INVALID_PARAMETER);
    expect(error.message).toContain('--fault:');
    expect(error.message).toContain('--duration:');
    expect(error.message).toContain('--fault-start:');
  });

  test('Consolidate needs a data directory', () => {
    expect(() => parseOptions(ConsolidateOptionsSchema, { dataDir: '' })).toThrow(ConfigurationError);
    expect(parseOptions(ConsolidateOptionsSchema, { dataDir: './data' })).toEqual({ dataDir: './data' });
  });
});

describe('CLI program', () => {
  let dir: ReturnType<typeof tempDir>;

  beforeEach(() => {
    dir = tempDir();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    dir.cleanup();
  });

  test('Exposes the three commands', () => {
    expect(buildProgram().commands.map(c => c.name())).toEqual(['simulate', 'consolidate', 'run-all']);
  });

  test('simulate then consolidate', () => {
    const raw = join(dir.path, 'dataset_normal.csv');
    buildProgram().parse(
      ['simulate', '--fault', 'normal', '--duration', '2e10', '--sample-interval', '1e10', '--output', raw],
      { from: 'user' }
    );
    // 2 ticks x 4 links
    expect(readFileSync(raw, 'utf8').trim().split('\n')).toHaveLength(9);

    buildProgram().parse(['consolidate', '--data-dir', dir.path], { from: 'user' });
    expect(existsSync(join(dir.path, 'dataset_full.csv'))).toBe(true);
  });
});

/**
 * QKD Telemetry - Dataset Consolidator Tests
 */

import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ALL_FAULT_TYPES, FaultType, faultId } from '../types/common';
import { FEATURE_COLUMNS, TELEMETRY_COLUMNS, TelemetrySample } from '../types/telemetry';
import { writeCsv } from '../dataset/csv';
import {
  CONSOLIDATED_FILE,
  consolidate,
  discoverInputs,
  expectedFileName,
  loadAndLabel,
} from '../dataset/consolidator';
import { setLogLevel } from '../utils/logger';
import { telemetrySample, tempDir } from './helpers';

/** `count` rows on one link; the second half carries the fault label */
function rawRows(fault: FaultType, count: number): TelemetrySample[] {
  return Array.from({ length: count }, (_, i) => {
    const label: FaultType = i < count / 2 ? 'normal' : fault;
    return telemetrySample({
      timestamp_ps: (i + 1) * 10_000_000_000,
      qber: 0.01 + i / 1000,
      label,
      fault_id: faultId(label),
    });
  });
}

function writeRaw(dir: string, file: string, rows: TelemetrySample[]): void {
  writeCsv(join(dir, file), rows, TELEMETRY_COLUMNS);
}

beforeAll(() => setLogLevel('silent'));

describe('Dataset Consolidator', () => {
  let dir: ReturnType<typeof tempDir>;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    dir.cleanup();
  });

  function writeAllScenarios(): void {
    ALL_FAULT_TYPES.forEach((fault, i) => writeRaw(dir.path, expectedFileName(fault), rawRows(fault, i + 2)));
  }

  test('Merges the six scenario files', () => {
    writeAllScenarios();
    const result = consolidate(dir.path);
    if (!result.ok) throw new Error(result.error.message);

    const report = result.value;
    // 2 + 3 + 4 + 5 + 6 + 7 rows
    expect(report.rowCount).toBe(27);
    expect(report.files).toHaveLength(6);
    expect(report.missing).toEqual([]);
    expect(report.skipped).toEqual([]);
    expect(report.faultCounts).toEqual({
      normal: 2,
      qber: 3,
      degrade: 4,
      node_fail: 5,
      blinding: 6,
      trojan: 7,
    });
    // first ceil(n/2) rows of each file are labeled normal
    expect(report.labelCounts).toEqual({
      normal: 2 + 2 + 2 + 3 + 3 + 4,
      qber: 1,
      degrade: 2,
      node_fail: 2,
      blinding: 3,
      trojan: 3,
    });
    expect(existsSync(join(dir.path, CONSOLIDATED_FILE))).toBe(true);
  });

  test('Writes the feature columns in order', () => {
    writeAllScenarios();
    consolidate(dir.path);

    const [header] = readFileSync(join(dir.path, CONSOLIDATED_FILE), 'utf8').split('\n');
    expect(header).toBe(FEATURE_COLUMNS.join(','));
  });

  test('Stamps the file-level scenario and id on every row', () => {
    writeRaw(dir.path, 'dataset_qber.csv', rawRows('qber', 4));
    const loaded = loadAndLabel(join(dir.path, 'dataset_qber.csv'));
    if (!loaded.ok) throw new Error(loaded.error.message);

    expect(loaded.value.rows.map(r => [r.label, r.fault_id, r.fault_name])).toEqual([
      ['normal', 1, 'qber'],
      ['normal', 1, 'qber'],
      ['qber', 1, 'qber'],
      ['qber', 1, 'qber'],
    ]);
  });

  test('Logs the row count of each source scenario beside its fault-labeled rows', () => {
    writeAllScenarios();
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');
    try {
      consolidate(dir.path);
      const lines = spy.mock.calls.map(call => String(call[0]));
      expect(lines.some(line => line.endsWith('  node_fail  5 / 2'))).toBe(true);
      expect(lines.some(line => line.endsWith('  normal     2 / 16'))).toBe(true);
    } finally {
      setLogLevel('silent');
      spy.mockRestore();
    }
  });

  test('A near-miss file name is excluded, not labeled', () => {
    writeAllScenarios();
    writeRaw(dir.path, 'dataset_qbert.csv', rawRows('qber', 10));

    const result = consolidate(dir.path);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.skipped).toEqual(['dataset_qbert.csv']);
    expect(result.value.rowCount).toBe(27);

    const direct = loadAndLabel(join(dir.path, 'dataset_qbert.csv'));
    expect(direct.ok ? 'loaded' : direct.error.code).toBe('UNRECOGNIZED_FILE');
  });

  test('The consolidated output is not read back as input', () => {
    writeAllScenarios();
    consolidate(dir.path);
    const second = consolidate(dir.path);
    if (!second.ok) throw new Error(second.error.message);

    expect(second.value.skipped).toEqual([]);
    expect(second.value.rowCount).toBe(27);
  });

  test('An output in another directory does not hide an input of the same name', () => {
    writeRaw(dir.path, 'dataset_normal.csv', rawRows('normal', 2));
    writeRaw(dir.path, 'dataset_qber.csv', rawRows('qber', 2));
    const output = join(dir.path, 'out', 'dataset_normal.csv');

    const result = consolidate(dir.path, output);
    if (!result.ok) throw new Error(result.error.message);
    expect(result.value.files).toEqual(['dataset_normal.csv', 'dataset_qber.csv']);
    expect(result.value.missing).not.toContain('dataset_normal.csv');
    expect(result.value.rowCount).toBe(4);
  });

  test('Only the file at the output path itself is excluded', () => {
    writeRaw(dir.path, 'dataset_normal.csv', rawRows('normal', 2));
    writeRaw(dir.path, 'dataset_qber.csv', rawRows('qber', 2));

    const discovered = discoverInputs(dir.path, join(dir.path, '.', 'dataset_qber.csv'));
    if (!discovered.ok) throw new Error(discovered.error.message);
    expect(discovered.value.valid.map(v => v.file)).toEqual(['dataset_normal.csv']);
  });

  test('Missing scenarios are reported, not fatal', () => {
    writeRaw(dir.path, 'dataset_normal.csv', rawRows('normal', 2));
    writeRaw(dir.path, 'dataset_qber.csv', rawRows('qber', 2));

    const discovered = discoverInputs(dir.path);
    if (!discovered.ok) throw new Error(discovered.error.message);
    expect(discovered.value.valid.map(v => v.file)).toEqual(['dataset_normal.csv', 'dataset_qber.csv']);
    expect(discovered.value.missing).toEqual([
      'dataset_degrade.csv',
      'dataset_node_fail.csv',
      'dataset_blinding.csv',
      'dataset_trojan.csv',
    ]);

    const result = consolidate(dir.path);
    expect(result.ok && result.value.rowCount).toBe(4);
  });

  test('No valid input writes nothing', () => {
    writeRaw(dir.path, 'dataset_unknown.csv', rawRows('normal', 2));
    const output = join(dir.path, CONSOLIDATED_FILE);

    const result = consolidate(dir.path, output);
    expect(result.ok ? 'written' : result.error.code).toBe('NO_VALID_INPUT');
    expect(existsSync(output)).toBe(false);
  });

  test('An unreadable directory is a read failure', () => {
    const result = discoverInputs(join(dir.path, 'absent'));
    expect(result.ok ? 'listed' : result.error.code).toBe('READ_FAILED');
  });

  test('Rows failing the schema are skipped', () => {
    const header = TELEMETRY_COLUMNS.join(',');
    const good = '10000000000,L,N,0.012,120,700.5,120,1,100,0.8,0,0,normal,0,3,0';
    const bad = '20000000000,L,N,abc,120,700.5,120,1,100,0.8,0,0,normal,0,3,0';
    writeFileSync(join(dir.path, 'dataset_normal.csv'), `${header}\n${good}\n${bad}\n`);

    const loaded = loadAndLabel(join(dir.path, 'dataset_normal.csv'));
    if (!loaded.ok) throw new Error(loaded.error.message);
    expect(loaded.value.rows).toHaveLength(1);
    expect(loaded.value.rejected.map(r => r.code)).toEqual(['INVALID_ROW']);
    expect(loaded.value.rejected[0].message).toMatch(/^dataset_normal\.csv line 3: qber/);
  });

  test('Files without the buffer columns still load', () => {
    const columns = TELEMETRY_COLUMNS.filter(c => c !== 'keys_buffer' && c !== 'starvation_events');
    writeCsv(join(dir.path, 'dataset_degrade.csv'), rawRows('degrade', 2), columns);

    const loaded = loadAndLabel(join(dir.path, 'dataset_degrade.csv'));
    if (!loaded.ok) throw new Error(loaded.error.message);
    expect(loaded.value.rows.map(r => [r.keys_buffer, r.starvation_events])).toEqual([
      [0, 0],
      [0, 0],
    ]);
  });

  test('Output is byte-identical across runs', () => {
    writeAllScenarios();
    const first = join(dir.path, 'out', 'first.csv');
    const second = join(dir.path, 'out', 'second.csv');
    consolidate(dir.path, first);
    consolidate(dir.path, second);

    expect(readFileSync(second, 'utf8')).toBe(readFileSync(first, 'utf8'));
  });
});

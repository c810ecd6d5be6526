/**
 * QKD Telemetry - Dataset Consolidator
 *
 * Merges the six raw per-scenario CSVs into one feature table. Files are
 * labeled by exact name; anything else is reported and left out.
 */

import { readdirSync } from 'fs';
import { basename, join, resolve } from 'path';
import { ALL_FAULT_TYPES, FaultType, faultId } from '../types/common';
import { DatasetError } from '../types/errors';
import { FEATURE_COLUMNS, FeatureRecord, LabeledSample } from '../types/telemetry';
import { Result, err, errorMessage, ok, tryCatch } from '../utils/result';
import { createLogger } from '../utils/logger';
import { readCsv, writeCsv } from './csv';
import { engineerFeatures } from './features';
import { parseTelemetryRow } from './schema';

const log = createLogger('dataset');

/** Default consolidated output name */
export const CONSOLIDATED_FILE = 'dataset_full.csv';

/** Canonical raw file name of each scenario */
export function expectedFileName(fault: FaultType): string {
  return `dataset_${fault}.csv`;
}

/** Canonical file name -> scenario */
export const EXPECTED_FILES: ReadonlyMap<string, FaultType> = new Map(
  ALL_FAULT_TYPES.map(fault => [expectedFileName(fault), fault])
);

const RAW_FILE_PATTERN = /^dataset_.*\.csv$/;

// ============================================
// TYPES
// ============================================

export interface DatasetInput {
  file: string;
  path: string;
  fault: FaultType;
}

export interface DiscoveredInputs {
  /** Canonical files present, in file-name order */
  valid: DatasetInput[];
  /** `dataset_*.csv` files matching no scenario */
  skipped: string[];
  /** Canonical file names not found */
  missing: string[];
}

export interface LoadedFile {
  fault: FaultType;
  rows: LabeledSample[];
  /** Rows rejected by the schema */
  rejected: DatasetError[];
}

export interface ConsolidationReport {
  output: string;
  files: string[];
  skipped: string[];
  missing: string[];
  rowCount: number;
  rejectedRows: number;
  /** Row count per sample label */
  labelCounts: Record<FaultType, number>;
  /** Row count per source scenario */
  faultCounts: Record<FaultType, number>;
  columns: readonly string[];
  records: FeatureRecord[];
}

// ============================================
// DISCOVERY
// ============================================

/**
 * Classify the raw CSVs of a directory. `exclude` is the path of a file to
 * ignore silently, normally the consolidated output itself; only a file
 * at that exact location is left out.
 */
export function discoverInputs(
  dataDir: string,
  exclude: string = join(dataDir, CONSOLIDATED_FILE)
): Result<DiscoveredInputs, DatasetError> {
  const excluded = resolve(exclude);
  const listing = tryCatch(
    () => readdirSync(dataDir),
    (e): DatasetError => ({
      code: 'READ_FAILED',
      message: `Cannot list ${dataDir}: ${errorMessage(e)}`,
    })
  );
  if (!listing.ok) return listing;

  const candidates = listing.value
    .filter(file => RAW_FILE_PATTERN.test(file) && resolve(dataDir, file) !== excluded)
    .sort();

  const valid: DatasetInput[] = [];
  const skipped: string[] = [];
  for (const file of candidates) {
    const fault = EXPECTED_FILES.get(file);
    if (fault === undefined) {
      skipped.push(file);
    } else {
      valid.push({ file, path: join(dataDir, file), fault });
    }
  }

  const present = new Set(valid.map(input => input.file));
  const missing = [...EXPECTED_FILES.keys()].filter(file => !present.has(file));

  return ok({ valid, skipped, missing });
}

// ============================================
// LOADING
// ============================================

/**
 * Load one raw CSV and stamp every row with the file's scenario.
 * fault_id is overwritten with the scenario's id; the per-row label is
 * kept.
 */
export function loadAndLabel(path: string): Result<LoadedFile, DatasetError> {
  const file = basename(path);
  const fault = EXPECTED_FILES.get(file);
  if (fault === undefined) {
    return err({
      code: 'UNRECOGNIZED_FILE',
      message: `${file} does not match any scenario file name`,
      file,
    });
  }

  const table = tryCatch(
    () => readCsv(path),
    (e): DatasetError => ({
      code: 'READ_FAILED',
      message: `Cannot read ${path}: ${errorMessage(e)}`,
      file,
    })
  );
  if (!table.ok) return table;

  const rows: LabeledSample[] = [];
  const rejected: DatasetError[] = [];
  table.value.forEach((raw, index) => {
    const parsed = parseTelemetryRow(raw);
    if (parsed.success) {
      rows.push({ ...parsed.sample, fault_id: faultId(fault), fault_name: fault });
    } else {
      // header is line 1
      rejected.push({
        code: 'INVALID_ROW',
        message: `${file} line ${index + 2}: ${parsed.reason}`,
        file,
      });
    }
  });

  return ok({ fault, rows, rejected });
}

// ============================================
// CONSOLIDATION
// ============================================

function countBy(rows: readonly LabeledSample[], key: 'label' | 'fault_name'): Record<FaultType, number> {
  const counts: Record<FaultType, number> = {
    normal: 0,
    qber: 0,
    degrade: 0,
    node_fail: 0,
    blinding: 0,
    trojan: 0,
  };
  for (const row of rows) {
    counts[row[key]]++;
  }
  return counts;
}

/**
 * Load every canonical file in `dataDir`, engineer features and write the
 * unified table to `output`. Returns NO_VALID_INPUT, without writing,
 * when nothing could be loaded.
 */
export function consolidate(
  dataDir: string,
  output: string = join(dataDir, CONSOLIDATED_FILE)
): Result<ConsolidationReport, DatasetError> {
  const discovered = discoverInputs(dataDir, output);
  if (!discovered.ok) {
    log.error(discovered.error.message);
    return discovered;
  }

  const { valid, skipped, missing } = discovered.value;
  for (const file of skipped) {
    log.warn(`Skipping ${file}: not a recognised scenario file`);
  }
  for (const file of missing) {
    log.warn(`Missing ${file}`);
  }

  const combined: LabeledSample[] = [];
  const files: string[] = [];
  let rejectedRows = 0;

  for (const input of valid) {
    const loaded = loadAndLabel(input.path);
    if (!loaded.ok) {
      log.warn(loaded.error.message);
      continue;
    }
    for (const problem of loaded.value.rejected) {
      log.warn(problem.message);
    }
    rejectedRows += loaded.value.rejected.length;
    if (loaded.value.rows.length === 0) {
      log.warn(`${input.file} holds no valid rows`);
      continue;
    }

    log.info(`Loaded ${input.file} (${loaded.value.rows.length} rows) as ${input.fault}`);
    combined.push(...loaded.value.rows);
    files.push(input.file);
  }

  if (combined.length === 0) {
    const message = `No valid scenario files found in ${dataDir}`;
    log.warn(message);
    return err({ code: 'NO_VALID_INPUT', message });
  }

  const records = engineerFeatures(combined);
  const labelCounts = countBy(records, 'label');
  const faultCounts = countBy(records, 'fault_name');

  log.info('Scenario distribution (rows / fault-labeled rows):');
  for (const fault of ALL_FAULT_TYPES) {
    log.info(`  ${fault.padEnd(10)} ${faultCounts[fault]} / ${labelCounts[fault]}`);
  }
  log.info(`Total rows: ${records.length}`);
  log.info(`Columns: ${FEATURE_COLUMNS.join(', ')}`);

  writeCsv(output, records, FEATURE_COLUMNS);
  log.success(`Saved consolidated dataset to ${output}`);

  return ok({
    output,
    files,
    skipped,
    missing,
    rowCount: records.length,
    rejectedRows,
    labelCounts,
    faultCounts,
    columns: FEATURE_COLUMNS,
    records,
  });
}

/**
 * QKD Telemetry - Telemetry and Dataset Record Types
 *
 * Row shapes of the raw per-scenario CSV and of the consolidated
 * feature table. Property names are the CSV column names.
 */

import { FaultType, LinkName, NodeName, Picoseconds } from './common';

// ============================================
// RAW TELEMETRY
// ============================================

/** Metrics extracted for one link at one instant */
export interface LinkMetrics {
  qber: number;
  key_rate_sifted: number;
  key_rate_final: number;
  detection_count: number;
  error_count: number;
  dark_count_rate: number;
  detector_efficiency: number;
  back_reflection_power: number;
  phase_error_rate: number;
  keys_buffer: number;
  starvation_events: number;
}

/** One row per (sample time, link) */
export interface TelemetrySample extends LinkMetrics {
  timestamp_ps: Picoseconds;
  link: LinkName;
  /** Transmitting node of the link */
  node: NodeName;
  label: FaultType;
  fault_id: number;
}

/** Raw CSV column order */
export const TELEMETRY_COLUMNS = [
  'timestamp_ps',
  'link',
  'node',
  'qber',
  'key_rate_sifted',
  'key_rate_final',
  'detection_count',
  'error_count',
  'dark_count_rate',
  'detector_efficiency',
  'back_reflection_power',
  'phase_error_rate',
  'label',
  'fault_id',
  'keys_buffer',
  'starvation_events',
] as const satisfies readonly (keyof TelemetrySample)[];

/** Decimal places kept by the recorder, per floating column */
export const RECORDER_PRECISION = {
  qber: 6,
  key_rate_sifted: 2,
  key_rate_final: 2,
  dark_count_rate: 2,
  detector_efficiency: 4,
  back_reflection_power: 9,
  phase_error_rate: 6,
} as const satisfies Partial<Record<keyof TelemetrySample, number>>;

// ============================================
// FEATURE RECORDS
// ============================================

/** Columns derived per (fault_name, link) group */
export interface DerivedFeatures {
  qber_delta: number;
  qber_ma5: number;
  qber_var5: number;
  key_rate_drop: number;
  dark_count_delta: number;
  back_reflection_alert: 0 | 1;
  qber_alert: 0 | 1;
}

/** A raw sample labeled with the scenario of the file it came from */
export interface LabeledSample extends TelemetrySample {
  fault_name: FaultType;
}

export interface FeatureRecord extends LabeledSample, DerivedFeatures {}

export const DERIVED_COLUMNS = [
  'qber_delta',
  'qber_ma5',
  'qber_var5',
  'key_rate_drop',
  'dark_count_delta',
  'back_reflection_alert',
  'qber_alert',
] as const satisfies readonly (keyof DerivedFeatures)[];

/** Consolidated CSV column order */
export const FEATURE_COLUMNS = [
  ...TELEMETRY_COLUMNS,
  'fault_name',
  ...DERIVED_COLUMNS,
] as const satisfies readonly (keyof FeatureRecord)[];

// ============================================
// THRESHOLDS
// ============================================

/** Reverse optical power above which a trojan-horse alert is raised (W) */
export const BACK_REFLECTION_ALERT_THRESHOLD = 1e-6;

/** Classical QBER alarm threshold of the key management system */
export const QBER_ALERT_THRESHOLD = 0.05;

/** Trailing window of the rolling QBER statistics */
export const ROLLING_WINDOW = 5;

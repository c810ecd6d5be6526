/**
 * QKD Telemetry - Metrics Collector
 *
 * Append-only buffer of telemetry rows, rounded to the recorder's
 * precision on entry, and the raw per-scenario CSV writer.
 */

import { LinkName } from '../types/common';
import { RECORDER_PRECISION, TELEMETRY_COLUMNS, TelemetrySample } from '../types/telemetry';
import { writeCsv } from '../dataset/csv';
import { createLogger } from '../utils/logger';

const log = createLogger('recorder');

/** Round to a fixed number of decimal places */
export function roundTo(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  return Number(value.toFixed(digits));
}

// ============================================
// METRICS COLLECTOR
// ============================================

/**
 * Collects telemetry rows in the order they are recorded
 */
export class MetricsCollector {
  private readonly rows: TelemetrySample[] = [];

  /**
   * Record one row
   */
  record(sample: TelemetrySample): TelemetrySample {
    const p = RECORDER_PRECISION;
    const rounded: TelemetrySample = {
      ...sample,
      qber: roundTo(sample.qber, p.qber),
      key_rate_sifted: roundTo(sample.key_rate_sifted, p.key_rate_sifted),
      key_rate_final: roundTo(sample.key_rate_final, p.key_rate_final),
      dark_count_rate: roundTo(sample.dark_count_rate, p.dark_count_rate),
      detector_efficiency: roundTo(sample.detector_efficiency, p.detector_efficiency),
      back_reflection_power: roundTo(sample.back_reflection_power, p.back_reflection_power),
      phase_error_rate: roundTo(sample.phase_error_rate, p.phase_error_rate),
    };
    this.rows.push(rounded);
    return rounded;
  }

  /** Recorded rows, oldest first */
  get records(): readonly TelemetrySample[] {
    return this.rows;
  }

  get count(): number {
    return this.rows.length;
  }

  /** Rows of one link */
  forLink(link: LinkName): TelemetrySample[] {
    return this.rows.filter(row => row.link === link);
  }

  /**
   * Write every row to `path` with the fixed column order. Writes
   * nothing when no row was recorded. Returns the number of rows written.
   */
  save(path: string): number {
    if (this.rows.length === 0) {
      log.warn(`No telemetry recorded, ${path} not written`);
      return 0;
    }

    writeCsv(path, this.rows, TELEMETRY_COLUMNS);
    log.success(`Saved ${this.rows.length} rows to ${path}`);
    return this.rows.length;
  }
}

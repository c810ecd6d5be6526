/**
 * QKD Telemetry - Feature Engineering
 *
 * Derived signal columns computed per (fault_name, link) group in
 * timestamp order. Windows never cross group boundaries and the first
 * differenced value of every group is 0.
 */

import {
  BACK_REFLECTION_ALERT_THRESHOLD,
  DerivedFeatures,
  FeatureRecord,
  LabeledSample,
  QBER_ALERT_THRESHOLD,
  ROLLING_WINDOW,
} from '../types/telemetry';

// ============================================
// SERIES HELPERS
// ============================================

/** First difference; the first element is 0 */
export function diff(values: readonly number[]): number[] {
  return values.map((value, i) => (i === 0 ? 0 : value - values[i - 1]));
}

function trailing(values: readonly number[], index: number, window: number): number[] {
  return values.slice(Math.max(0, index - window + 1), index + 1);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Trailing mean over up to `window` values (minimum one) */
export function rollingMean(values: readonly number[], window = ROLLING_WINDOW): number[] {
  return values.map((_, i) => mean(trailing(values, i, window)));
}

/**
 * Trailing sample variance (n - 1 denominator); 0 while fewer than two
 * values are available
 */
export function rollingVariance(values: readonly number[], window = ROLLING_WINDOW): number[] {
  return values.map((_, i) => {
    const slice = trailing(values, i, window);
    if (slice.length < 2) return 0;
    const m = mean(slice);
    const squares = slice.reduce((sum, v) => sum + (v - m) * (v - m), 0);
    return squares / (slice.length - 1);
  });
}

/**
 * Relative change from the previous value, clipped to [-1, 1].
 * 0 -> 0 is no change; x -> from 0 saturates at the sign of x.
 */
export function pctChange(values: readonly number[]): number[] {
  return values.map((value, i) => {
    if (i === 0) return 0;
    const previous = values[i - 1];
    if (previous === 0) {
      return value === 0 ? 0 : Math.sign(value);
    }
    const change = (value - previous) / previous;
    return Math.min(1, Math.max(-1, change));
  });
}

// ============================================
// GROUPING
// ============================================

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Stable order by fault_name, link, timestamp */
export function sortSamples<T extends LabeledSample>(rows: readonly T[]): T[] {
  return [...rows].sort(
    (a, b) =>
      compareText(a.fault_name, b.fault_name) ||
      compareText(a.link, b.link) ||
      a.timestamp_ps - b.timestamp_ps
  );
}

function groupKey(row: LabeledSample): string {
  return `${row.fault_name}\u0000${row.link}`;
}

/** Split sorted rows into contiguous (fault_name, link) runs */
function contiguousGroups<T extends LabeledSample>(sorted: readonly T[]): T[][] {
  const groups: T[][] = [];
  let current: T[] = [];
  let key: string | null = null;

  for (const row of sorted) {
    const k = groupKey(row);
    if (k !== key) {
      if (current.length > 0) groups.push(current);
      current = [];
      key = k;
    }
    current.push(row);
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

// ============================================
// FEATURES
// ============================================

function deriveGroup(group: readonly LabeledSample[]): DerivedFeatures[] {
  const qber = group.map(r => r.qber);
  const qberDelta = diff(qber);
  const qberMa = rollingMean(qber);
  const qberVar = rollingVariance(qber);
  const keyRateDrop = pctChange(group.map(r => r.key_rate_sifted));
  const darkDelta = diff(group.map(r => r.dark_count_rate));

  return group.map((row, i): DerivedFeatures => ({
    qber_delta: qberDelta[i],
    qber_ma5: qberMa[i],
    qber_var5: qberVar[i],
    key_rate_drop: keyRateDrop[i],
    dark_count_delta: darkDelta[i],
    back_reflection_alert: row.back_reflection_power > BACK_REFLECTION_ALERT_THRESHOLD ? 1 : 0,
    qber_alert: row.qber > QBER_ALERT_THRESHOLD ? 1 : 0,
  }));
}

/**
 * Sort labeled rows and append the derived columns
 */
export function engineerFeatures(rows: readonly LabeledSample[]): FeatureRecord[] {
  const records: FeatureRecord[] = [];
  for (const group of contiguousGroups(sortSamples(rows))) {
    const derived = deriveGroup(group);
    group.forEach((row, i) => records.push({ ...row, ...derived[i] }));
  }
  return records;
}

/**
 * QKD Telemetry - Common Types
 *
 * Fundamental type aliases, time units and the canonical fault taxonomy
 * shared by the harness, the kernel and the dataset pipeline.
 */

// ============================================
// CORE TYPE ALIASES
// ============================================

/** Simulated time in picoseconds (non-negative integer) */
export type Picoseconds = number;

/** Name of a network node (e.g. "Otemachi") */
export type NodeName = string;

/** Name of a physical link, `${nodeA}_${nodeB}` */
export type LinkName = string;

// ============================================
// TIME UNITS
// ============================================

export const PS_PER_NS = 1_000;
export const PS_PER_US = 1_000_000;
export const PS_PER_MS = 1_000_000_000;
export const PS_PER_SECOND = 1_000_000_000_000;

/** Convert picoseconds to seconds */
export function toSeconds(time: Picoseconds): number {
  return time / PS_PER_SECOND;
}

// ============================================
// FAULT TAXONOMY
// ============================================

/** Operating conditions: baseline plus five attack/failure modes */
export type FaultType =
  | 'normal'      // Baseline operation
  | 'qber'        // Intercept-resend eavesdropping
  | 'degrade'     // Channel degradation (3x attenuation)
  | 'node_fail'   // Trusted node goes offline
  | 'blinding'    // Detector blinding, QBER stays normal
  | 'trojan';     // Trojan horse, anomalous reverse optical power

export const ALL_FAULT_TYPES: readonly FaultType[] = [
  'normal',
  'qber',
  'degrade',
  'node_fail',
  'blinding',
  'trojan',
];

/** Numeric class id used as the ML target */
export const FAULT_LABELS: Readonly<Record<FaultType, number>> = {
  normal: 0,
  qber: 1,
  degrade: 2,
  node_fail: 3,
  blinding: 4,
  trojan: 5,
};

/** Faults that carry a perturbation */
export type ActiveFaultType = Exclude<FaultType, 'normal'>;

export function isFaultType(value: string): value is FaultType {
  return ALL_FAULT_TYPES.some(type => type === value);
}

/** Numeric id of a fault label */
export function faultId(label: FaultType): number {
  return FAULT_LABELS[label];
}

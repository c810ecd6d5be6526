/**
 * QKD Telemetry - Error Types
 */

// ============================================
// ERROR CODES
// ============================================

export enum HarnessErrorCode {
  /** A link or route references a node that was never declared */
  UNDECLARED_NODE = 'UNDECLARED_NODE',

  /** A node or link name is declared twice */
  DUPLICATE_NAME = 'DUPLICATE_NAME',

  /** Two protocols cannot be paired over the declared channels */
  MISSING_CHANNEL = 'MISSING_CHANNEL',

  /** A fault targets a node or link absent from the topology */
  MISSING_FAULT_TARGET = 'MISSING_FAULT_TARGET',

  /** A fault injector was armed more than once */
  ALREADY_ARMED = 'ALREADY_ARMED',

  /** A run parameter is out of range */
  INVALID_PARAMETER = 'INVALID_PARAMETER',

  /** An event was scheduled before the current simulated time */
  EVENT_IN_PAST = 'EVENT_IN_PAST',

  /** An event time is not a non-negative integer */
  INVALID_EVENT_TIME = 'INVALID_EVENT_TIME',

  /** A protocol was used before being paired */
  PROTOCOL_NOT_PAIRED = 'PROTOCOL_NOT_PAIRED',
}

export interface HarnessError {
  code: HarnessErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================
// DATASET ERRORS
// ============================================

/** Recoverable conditions met while consolidating raw telemetry */
export type DatasetErrorCode =
  | 'NO_VALID_INPUT'
  | 'UNRECOGNIZED_FILE'
  | 'READ_FAILED'
  | 'INVALID_ROW';

export interface DatasetError {
  code: DatasetErrorCode;
  message: string;
  file?: string;
}

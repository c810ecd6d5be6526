/**
 * QKD Telemetry - Error Classes
 *
 * Configuration problems are fatal and raised before the kernel runs;
 * kernel misuse is a programming error.
 */

import { HarnessError, HarnessErrorCode } from '../types/errors';

export class ConfigurationError extends Error {
  public readonly code: HarnessErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: HarnessError) {
    super(error.message);
    this.name = 'ConfigurationError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): HarnessError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class KernelError extends Error {
  public readonly code: HarnessErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(error: HarnessError) {
    super(error.message);
    this.name = 'KernelError';
    this.code = error.code;
    this.details = error.details;
  }

  toJSON(): HarnessError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

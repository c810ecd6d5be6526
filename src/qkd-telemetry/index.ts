/**
 * QKD Telemetry - Public API
 *
 * Fault-injection harness for a simulated QKD network and the dataset
 * pipeline that turns its telemetry into labeled feature records.
 */

// ============================================
// TYPE EXPORTS
// ============================================

export * from './types/common';
export * from './types/errors';
export * from './types/network';
export * from './types/scenario';
export * from './types/telemetry';

// ============================================
// UTILITIES
// ============================================

export { ConfigurationError, KernelError } from './utils/errors';
export { Result, Ok, Err, ok, err, tryCatch, errorMessage } from './utils/result';
export { Logger, LogLevel, createLogger, setLogLevel, getLogLevel } from './utils/logger';

// ============================================
// KERNEL
// ============================================

export * from './kernel';

// ============================================
// HARNESS
// ============================================

export { classicalDelay, validateTopology, buildNetwork, BuildOptions } from './engines/topology-builder';
export { scheduleAt, scheduleEvery, scheduleRecurring } from './engines/scheduling-adapter';
export {
  createScenarioContext,
  labelAt,
  recordStarvation,
  starvationCount,
} from './engines/scenario-context';
export { FaultInjector, createFaultInjector } from './engines/fault-injector';
export { KeySource, LinkProtocols, attachProtocols, keySourceOf } from './engines/protocol-attachment';
export { TrafficModel } from './engines/traffic-model';
export { TelemetrySampler, extractLinkMetrics } from './engines/telemetry-sampler';
export { MetricsCollector, roundTo } from './engines/metrics-collector';
export {
  ScenarioResult,
  ScenarioRunner,
  createScenarioRunner,
  runScenario,
  generateDataset,
  defaultOutputPath,
  validateSimulationConfig,
} from './engines/scenario-runner';

// ============================================
// SCENARIOS
// ============================================

export * from './scenarios';

// ============================================
// DATASET
// ============================================

export * from './dataset';

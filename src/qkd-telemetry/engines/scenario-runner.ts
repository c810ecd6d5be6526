/**
 * QKD Telemetry - Scenario Runner
 *
 * Wires one run end to end: topology, protocol pairing, fault arming,
 * traffic, sampling, kernel execution. Everything that can be checked
 * is checked before the kernel starts.
 */

import { FaultType, LinkName, Picoseconds, isFaultType, toSeconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { Network } from '../types/network';
import {
  DEFAULT_SIMULATION_CONFIG,
  DEFAULT_TRAFFIC_CONFIG,
  ScenarioContext,
  SimulationConfig,
} from '../types/scenario';
import { TelemetrySample } from '../types/telemetry';
import { Timeline } from '../kernel/timeline';
import { ConfigurationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { attachProtocols, LinkProtocols } from './protocol-attachment';
import { createFaultInjector } from './fault-injector';
import { MetricsCollector } from './metrics-collector';
import { createScenarioContext } from './scenario-context';
import { TelemetrySampler } from './telemetry-sampler';
import { buildNetwork } from './topology-builder';
import { TrafficModel } from './traffic-model';

const log = createLogger('runner');

// ============================================
// TYPES
// ============================================

export interface ScenarioResult {
  config: SimulationConfig;
  /** Rows in recording order */
  samples: readonly TelemetrySample[];
  network: Network;
  protocols: Map<LinkName, LinkProtocols>;
  context: ScenarioContext;
  collector: MetricsCollector;
  eventsExecuted: number;
}

/** Default raw CSV location of a scenario */
export function defaultOutputPath(fault: FaultType, dataDir = 'data'): string {
  return `${dataDir}/dataset_${fault}.csv`;
}

// ============================================
// VALIDATION
// ============================================

function invalid(message: string, details?: Record<string, unknown>): ConfigurationError {
  return new ConfigurationError({
    code: HarnessErrorCode.INVALID_PARAMETER,
    message,
    details,
  });
}

function isPositiveInteger(value: Picoseconds): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Check run parameters. Throws ConfigurationError on the first problem.
 */
export function validateSimulationConfig(config: SimulationConfig): void {
  if (!isFaultType(config.faultType)) {
    throw invalid(`Unknown fault type ${String(config.faultType)}`);
  }
  if (!isPositiveInteger(config.duration)) {
    throw invalid(`duration must be a positive integer number of ps, got ${config.duration}`);
  }
  if (!isPositiveInteger(config.sampleInterval)) {
    throw invalid(
      `sampleInterval must be a positive integer number of ps, got ${config.sampleInterval}`
    );
  }
  if (!Number.isInteger(config.faultStart) || config.faultStart < 0 || config.faultStart > config.duration) {
    throw invalid(`faultStart must lie within [0, ${config.duration}] ps, got ${config.faultStart}`);
  }
  if (!Number.isInteger(config.seed)) {
    throw invalid(`seed must be an integer, got ${config.seed}`);
  }

  const traffic = config.traffic;
  for (const key of ['keyLength', 'keysPerRequest', 'requestInterval', 'consumeInterval', 'consumeKeys'] as const) {
    if (!isPositiveInteger(traffic[key])) {
      throw invalid(`traffic.${key} must be a positive integer, got ${traffic[key]}`, { key });
    }
  }
}

// ============================================
// SCENARIO RUNNER
// ============================================

/**
 * Runs one fault scenario on a fresh timeline
 */
export class ScenarioRunner {
  private readonly config: SimulationConfig;

  constructor(config: SimulationConfig) {
    validateSimulationConfig(config);
    this.config = config;
  }

  get settings(): SimulationConfig {
    return this.config;
  }

  /**
   * Run the simulation to completion and return the recorded telemetry
   */
  run(): ScenarioResult {
    const config = this.config;
    const started = Date.now();

    const timeline = new Timeline(config.duration, config.seed);
    const network = buildNetwork(timeline, config.topology, {
      faultType: config.faultType,
      degradeMode: config.degradeMode,
    });
    const protocols = attachProtocols(network, { reconciliation: config.reconciliation });

    const context = createScenarioContext(config.faultType, config.faultStart);
    const injector = createFaultInjector(timeline, network, context);
    injector.arm();

    timeline.init();

    for (const linkProtocols of protocols.values()) {
      new TrafficModel(timeline, linkProtocols, context, config.traffic).schedule(config.duration);
    }

    const collector = new MetricsCollector();
    const sampler = new TelemetrySampler(timeline, network, protocols, context, collector);
    sampler.start(config.sampleInterval, config.duration);

    log.info(
      `Running ${config.faultType} for ${toSeconds(config.duration)}s ` +
        `(${network.nodes.size} nodes, ${network.links.length} links, seed ${config.seed})`
    );
    const eventsExecuted = timeline.run();

    log.info(
      `${config.faultType}: ${eventsExecuted} events, ${sampler.ticks} samples, ` +
        `${collector.count} rows in ${Date.now() - started}ms`
    );

    return {
      config,
      samples: collector.records,
      network,
      protocols,
      context,
      collector,
      eventsExecuted,
    };
  }
}

// ============================================
// FACTORY FUNCTIONS
// ============================================

/**
 * Create a runner from partial overrides of the default configuration
 */
export function createScenarioRunner(config?: Partial<SimulationConfig>): ScenarioRunner {
  return new ScenarioRunner({
    ...DEFAULT_SIMULATION_CONFIG,
    ...config,
    traffic: { ...DEFAULT_TRAFFIC_CONFIG, ...config?.traffic },
  });
}

/** Run one scenario with partial overrides */
export function runScenario(config?: Partial<SimulationConfig>): ScenarioResult {
  return createScenarioRunner(config).run();
}

/**
 * Run one scenario and write its raw CSV. Returns the run result and
 * the number of rows written.
 */
export function generateDataset(
  config: Partial<SimulationConfig>,
  output: string
): { result: ScenarioResult; rowsWritten: number } {
  const result = runScenario(config);
  const rowsWritten = result.collector.save(output);
  return { result, rowsWritten };
}

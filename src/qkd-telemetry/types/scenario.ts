/**
 * QKD Telemetry - Scenario Types
 *
 * Fault scenario definitions, the shared scenario context and the run
 * configuration with its defaults.
 */

import {
  ActiveFaultType,
  FaultType,
  LinkName,
  NodeName,
  Picoseconds,
  PS_PER_MS,
  PS_PER_SECOND,
} from './common';
import { DegradeMode, Network, TopologySpec, TOKYO_TOPOLOGY } from './network';

// ============================================
// FAULT SCENARIOS
// ============================================

/** Lifecycle of one fault injector */
export type FaultState = 'idle' | 'armed' | 'fired';

export type FaultTarget =
  | { kind: 'node'; node: NodeName }
  | { kind: 'link'; link: LinkName };

/** Idempotent mutation of node, channel or protocol state */
export type Perturbation = () => void;

/** One of the five fault signatures */
export interface FaultScenario {
  type: ActiveFaultType;
  name: string;
  description: string;
  target: FaultTarget;
  /** Telemetry columns expected to move after the trigger */
  signature: string[];
  /**
   * Resolve the target against a built network with protocols attached.
   * Throws a ConfigurationError when the target is absent.
   */
  prepare(network: Network): Perturbation;
}

// ============================================
// SCENARIO CONTEXT
// ============================================

/**
 * State shared by reference between the fault injector (writes the
 * label and fault state), the traffic model (writes starvation counters)
 * and the telemetry sampler (reads everything).
 */
export interface ScenarioContext {
  readonly faultType: FaultType;
  /** Trigger instant; null when the run carries no fault */
  readonly triggerTime: Picoseconds | null;
  /** Label set by the most recent fault firing */
  label: FaultType;
  faultState: FaultState;
  /** Cumulative consumption attempts on an empty key buffer, per link */
  starvation: Map<LinkName, number>;
}

// ============================================
// RUN CONFIGURATION
// ============================================

export interface TrafficConfig {
  /** Raw bits per requested key */
  keyLength: number;
  /** Keys per request */
  keysPerRequest: number;
  requestInterval: Picoseconds;
  consumeInterval: Picoseconds;
  /** Keys drained per consumption */
  consumeKeys: number;
}

export interface SimulationConfig {
  faultType: FaultType;
  /** Total simulated time (ps) */
  duration: Picoseconds;
  /** When the fault fires (ps) */
  faultStart: Picoseconds;
  sampleInterval: Picoseconds;
  seed: number;
  degradeMode: DegradeMode;
  /** Attach a Cascade layer above each BB84 pair */
  reconciliation: boolean;
  topology: TopologySpec;
  traffic: TrafficConfig;
}

export const DEFAULT_TRAFFIC_CONFIG: TrafficConfig = {
  keyLength: 256,
  keysPerRequest: 8,
  requestInterval: 100 * PS_PER_MS,
  consumeInterval: 80 * PS_PER_MS,
  consumeKeys: 2,
};

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  faultType: 'normal',
  duration: PS_PER_SECOND,
  faultStart: PS_PER_SECOND / 2,
  sampleInterval: 10 * PS_PER_MS,
  seed: 42,
  degradeMode: 'step',
  reconciliation: true,
  topology: TOKYO_TOPOLOGY,
  traffic: DEFAULT_TRAFFIC_CONFIG,
};

/** Nominal key length used when no sifted bits are attributable */
export const NOMINAL_KEY_LENGTH = 256;

/**
 * QKD Telemetry - Network Types
 *
 * Topology description, physical baselines and the built network.
 */

import { LinkName, NodeName } from './common';
import { QuantumChannel } from '../kernel/channels';
import { QKDNode } from '../kernel/node';

// ============================================
// TOPOLOGY DESCRIPTION
// ============================================

/** A physical link between adjacent nodes */
export interface LinkSpec {
  a: NodeName;
  b: NodeName;
  /** Fibre length (m) */
  distance: number;
}

export interface TopologySpec {
  nodes: NodeName[];
  /** Quantum + classical links, in order */
  links: LinkSpec[];
  /** Classical-only routes used by key management for rerouting */
  auxiliaryRoutes?: LinkSpec[];
}

/**
 * Where the degrade fault's attenuation change lives:
 * - 'step': applied by the fault injector at trigger time
 * - 'build': baked into the channel when the topology is built
 */
export type DegradeMode = 'step' | 'build';

// ============================================
// PHYSICAL PARAMETERS
// ============================================

export interface PhysicalBaseline {
  detectorEfficiency: number;
  /** counts/s */
  darkCountRate: number;
  /** ps */
  timeResolution: number;
  meanPhotonNum: number;
  /** Pulse rate (Hz) */
  sourceFrequency: number;
  /** dB/m */
  attenuation: number;
  /** Speed of light in fibre (m/s) */
  fibreLightSpeed: number;
  /** Classical processing overhead added to each hop (ps) */
  classicalOverhead: number;
}

/** Tokyo QKD Network figures (SSPD detectors, SMF-28 ULL fibre) */
export const PHYSICAL_BASELINE: PhysicalBaseline = {
  detectorEfficiency: 0.8,
  darkCountRate: 100,
  timeResolution: 100,
  meanPhotonNum: 0.1,
  sourceFrequency: 1e6,
  attenuation: 0.0002,
  fibreLightSpeed: 2e8,
  classicalOverhead: 8_000,
};

/** Attenuation multiplier of the degrade fault */
export const DEGRADE_FACTOR = 3;

/** Link whose fibre degrades in the degrade scenario */
export const DEGRADE_TARGET_LINK = 'Koganei_A_Koganei_B';

/** Five-node, four-link Tokyo QKD Network (~30 km) */
export const TOKYO_TOPOLOGY: TopologySpec = {
  nodes: ['Koganei_A', 'Koganei_B', 'Otemachi', 'Hakusan', 'Hongo'],
  links: [
    { a: 'Koganei_A', b: 'Koganei_B', distance: 7_000 },
    { a: 'Koganei_B', b: 'Otemachi', distance: 13_000 },
    { a: 'Otemachi', b: 'Hakusan', distance: 6_000 },
    { a: 'Hakusan', b: 'Hongo', distance: 4_200 },
  ],
  auxiliaryRoutes: [
    { a: 'Koganei_A', b: 'Otemachi', distance: 20_000 },
  ],
};

// ============================================
// BUILT NETWORK
// ============================================

/** (nodeA, nodeB, link name, quantum channel); nodeA transmits */
export interface NetworkLink {
  nodeA: QKDNode;
  nodeB: QKDNode;
  name: LinkName;
  quantumChannel: QuantumChannel;
}

export interface Network {
  nodes: Map<NodeName, QKDNode>;
  links: NetworkLink[];
}

/** Canonical link name */
export function linkName(a: NodeName, b: NodeName): LinkName {
  return `${a}_${b}`;
}

/**
 * QKD Telemetry - Topology Builder
 *
 * Instantiates nodes with baseline optics, one quantum channel and one
 * classical pair per link, and the classical-only reroute channels.
 * Every reference is validated before anything is constructed.
 */

import { FaultType, LinkName, NodeName, Picoseconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import {
  DEGRADE_FACTOR,
  DEGRADE_TARGET_LINK,
  DegradeMode,
  LinkSpec,
  Network,
  NetworkLink,
  PHYSICAL_BASELINE,
  PhysicalBaseline,
  TopologySpec,
  linkName,
} from '../types/network';
import { ClassicalChannel, QuantumChannel } from '../kernel/channels';
import { QKDNode } from '../kernel/node';
import { Timeline } from '../kernel/timeline';
import { ConfigurationError } from '../utils/errors';

export interface BuildOptions {
  faultType: FaultType;
  degradeMode: DegradeMode;
  /** Link receiving the baked-in attenuation in 'build' mode */
  degradedLink: LinkName;
  baseline: PhysicalBaseline;
}

const DEFAULT_BUILD_OPTIONS: BuildOptions = {
  faultType: 'normal',
  degradeMode: 'step',
  degradedLink: DEGRADE_TARGET_LINK,
  baseline: PHYSICAL_BASELINE,
};

/**
 * Classical channel delay: propagation in fibre plus processing overhead
 */
export function classicalDelay(
  distance: number,
  baseline: PhysicalBaseline = PHYSICAL_BASELINE
): Picoseconds {
  const propagation = Math.trunc((distance * 1e12) / baseline.fibreLightSpeed);
  return propagation + baseline.classicalOverhead;
}

// ============================================
// VALIDATION
// ============================================

/**
 * Check a topology for undeclared or duplicate names. Throws on the first
 * problem found.
 */
export function validateTopology(spec: TopologySpec): void {
  const declared = new Set<NodeName>();
  for (const name of spec.nodes) {
    if (declared.has(name)) {
      throw new ConfigurationError({
        code: HarnessErrorCode.DUPLICATE_NAME,
        message: `Node ${name} is declared twice`,
      });
    }
    declared.add(name);
  }

  const checkEnds = (link: LinkSpec, kind: string) => {
    for (const end of [link.a, link.b]) {
      if (!declared.has(end)) {
        throw new ConfigurationError({
          code: HarnessErrorCode.UNDECLARED_NODE,
          message: `${kind} ${link.a}-${link.b} references undeclared node ${end}`,
          details: { link, node: end },
        });
      }
    }
    if (link.a === link.b) {
      throw new ConfigurationError({
        code: HarnessErrorCode.INVALID_PARAMETER,
        message: `${kind} ${link.a}-${link.b} connects a node to itself`,
      });
    }
    if (!(link.distance > 0)) {
      throw new ConfigurationError({
        code: HarnessErrorCode.INVALID_PARAMETER,
        message: `${kind} ${link.a}-${link.b} has non-positive distance ${link.distance}`,
      });
    }
  };

  const seenLinks = new Set<string>();
  for (const link of spec.links) {
    checkEnds(link, 'Link');
    const name = linkName(link.a, link.b);
    if (seenLinks.has(name)) {
      throw new ConfigurationError({
        code: HarnessErrorCode.DUPLICATE_NAME,
        message: `Link ${name} is declared twice`,
      });
    }
    seenLinks.add(name);
  }

  for (const route of spec.auxiliaryRoutes ?? []) {
    checkEnds(route, 'Route');
  }
}

// ============================================
// BUILDER
// ============================================

/**
 * Build the network on a timeline. `degradedLink` receives the degrade
 * attenuation when the fault is `degrade` and degradeMode is 'build'.
 */
export function buildNetwork(
  timeline: Timeline,
  spec: TopologySpec,
  options?: Partial<BuildOptions>
): Network {
  const opts: BuildOptions = { ...DEFAULT_BUILD_OPTIONS, ...options };
  const baseline = opts.baseline;

  validateTopology(spec);

  const bakeDegrade = opts.faultType === 'degrade' && opts.degradeMode === 'build';
  if (bakeDegrade && !spec.links.some(l => linkName(l.a, l.b) === opts.degradedLink)) {
    throw new ConfigurationError({
      code: HarnessErrorCode.MISSING_FAULT_TARGET,
      message: `Degraded link ${opts.degradedLink} is not part of the topology`,
    });
  }

  const nodes = new Map<NodeName, QKDNode>();
  for (const name of spec.nodes) {
    const node = new QKDNode(name, timeline);

    node.lightSource.meanPhotonNum = baseline.meanPhotonNum;
    node.lightSource.frequency = baseline.sourceFrequency;
    node.qsDetector.setAll({
      efficiency: baseline.detectorEfficiency,
      darkCountRate: baseline.darkCountRate,
      timeResolution: baseline.timeResolution,
    });

    nodes.set(name, node);
  }

  const requireNode = (name: NodeName): QKDNode => {
    const node = nodes.get(name);
    if (!node) {
      throw new ConfigurationError({
        code: HarnessErrorCode.UNDECLARED_NODE,
        message: `Node ${name} is not part of the topology`,
      });
    }
    return node;
  };

  const links: NetworkLink[] = [];
  for (const link of spec.links) {
    const n1 = requireNode(link.a);
    const n2 = requireNode(link.b);
    const name = linkName(link.a, link.b);

    const qc = new QuantumChannel(`qc_${name}`, baseline.attenuation, link.distance);
    if (bakeDegrade && name === opts.degradedLink) {
      qc.attenuation = qc.nominalAttenuation * DEGRADE_FACTOR;
    }
    qc.setEnds(n1.name, n2.name);
    n1.qchannels[n2.name] = qc;

    connectClassical(n1, n2, `cc_${name}`, link.distance, baseline);

    links.push({ nodeA: n1, nodeB: n2, name, quantumChannel: qc });
  }

  for (const route of spec.auxiliaryRoutes ?? []) {
    connectClassical(
      requireNode(route.a),
      requireNode(route.b),
      `cc_${linkName(route.a, route.b)}`,
      route.distance,
      baseline
    );
  }

  return { nodes, links };
}

/** Register a forward/backward classical pair under peer-name keys */
function connectClassical(
  n1: QKDNode,
  n2: QKDNode,
  name: string,
  distance: number,
  baseline: PhysicalBaseline
): void {
  const delay = classicalDelay(distance, baseline);
  const forward = new ClassicalChannel(`${name}_fwd`, distance, delay);
  const backward = new ClassicalChannel(`${name}_bwd`, distance, delay);
  forward.setEnds(n1.name, n2.name);
  backward.setEnds(n2.name, n1.name);
  n1.cchannels[n2.name] = forward;
  n2.cchannels[n1.name] = backward;
}

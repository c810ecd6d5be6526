/**
 * QKD Telemetry - Kernel: QKD Node
 *
 * A site holding one light source, one polarization detector array,
 * a two-slot protocol stack and channel registries keyed by peer name.
 */

import { NodeName } from '../types/common';
import { ClassicalChannel, QuantumChannel } from './channels';
import { LightSource, QSDetectorPolarization } from './components';
import { Entity, Timeline } from './timeline';

// ============================================
// TYPES
// ============================================

/** Minimal surface every attached protocol exposes to its node */
export interface NodeProtocol {
  readonly name: string;
  init(): void;
  stop(): void;
}

/**
 * Values cached on the node by fault injection. When present they are
 * authoritative over the raw component parameters.
 */
export interface NodeOverrides {
  darkCountRate?: number;
  detectorEfficiency?: number;
  /** Reverse optical power leaving the node (W) */
  backReflectionPower?: number;
}

/** Protocol stack slot positions */
export const BB84_SLOT = 0;
export const RECONCILIATION_SLOT = 1;

// ============================================
// NODE
// ============================================

export class QKDNode implements Entity {
  readonly name: NodeName;
  readonly timeline: Timeline;
  readonly lightSource: LightSource;
  readonly qsDetector: QSDetectorPolarization;

  /** Fixed positions: [BB84, reconciliation]; last attachment wins */
  readonly protocolStack: [NodeProtocol | null, NodeProtocol | null] = [null, null];
  /** Every protocol ever attached to this node */
  readonly protocols: NodeProtocol[] = [];

  readonly cchannels: Record<NodeName, ClassicalChannel> = {};
  readonly qchannels: Record<NodeName, QuantumChannel> = {};

  isOffline = false;
  overrides: NodeOverrides = {};

  constructor(name: NodeName, timeline: Timeline) {
    this.name = name;
    this.timeline = timeline;
    this.lightSource = new LightSource(`${name}.lightsource`);
    this.qsDetector = new QSDetectorPolarization(`${name}.qsdetector`);
    timeline.addEntity(this);
  }

  /** Attach a protocol at a stack slot */
  attach(slot: typeof BB84_SLOT | typeof RECONCILIATION_SLOT, protocol: NodeProtocol): void {
    this.protocolStack[slot] = protocol;
    this.protocols.push(protocol);
  }

  init(): void {
    for (const protocol of this.protocols) {
      protocol.init();
    }
  }
}

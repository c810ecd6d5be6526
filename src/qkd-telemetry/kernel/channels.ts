/**
 * QKD Telemetry - Kernel: Optical and Classical Channels
 */

import { NodeName, Picoseconds } from '../types/common';

// ============================================
// QUANTUM CHANNEL
// ============================================

export class QuantumChannel {
  readonly name: string;
  readonly distance: number;
  /** Loss in dB per metre; the only parameter the degrade fault mutates */
  attenuation: number;
  /** Attenuation at construction, reference for idempotent faults */
  readonly nominalAttenuation: number;
  sender: NodeName | null = null;
  receiver: NodeName | null = null;

  constructor(name: string, attenuation: number, distance: number) {
    this.name = name;
    this.attenuation = attenuation;
    this.nominalAttenuation = attenuation;
    this.distance = distance;
  }

  setEnds(sender: NodeName, receiver: NodeName): void {
    this.sender = sender;
    this.receiver = receiver;
  }

  /** Fraction of photons surviving the fibre */
  transmittance(): number {
    return Math.pow(10, -(this.attenuation * this.distance) / 10);
  }
}

// ============================================
// CLASSICAL CHANNEL
// ============================================

export class ClassicalChannel {
  readonly name: string;
  readonly distance: number;
  /** One-way delay (ps) */
  readonly delay: Picoseconds;
  sender: NodeName | null = null;
  receiver: NodeName | null = null;

  constructor(name: string, distance: number, delay: Picoseconds) {
    this.name = name;
    this.distance = distance;
    this.delay = delay;
  }

  setEnds(sender: NodeName, receiver: NodeName): void {
    this.sender = sender;
    this.receiver = receiver;
  }
}

/**
 * QKD Telemetry - Kernel: Cascade Reconciliation
 *
 * Error correction and privacy amplification on top of BB84. Each sifted
 * key leaks about f*h(e)*n bits during Cascade and loses n*h(e) bits to
 * privacy amplification; keys with nothing left are discarded.
 */

import { Picoseconds, toSeconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { ConfigurationError, KernelError } from '../utils/errors';
import { BB84Protocol, CompletedKey, KeyListener } from './bb84';
import { NodeProtocol, QKDNode } from './node';

/** Reconciliation inefficiency factor f */
export const CASCADE_EFFICIENCY = 1.16;

/** Classical round trips spent per key */
export const CASCADE_PASSES = 4;

/** Binary Shannon entropy h(p) */
export function binaryEntropy(p: number): number {
  if (p <= 0 || p >= 1) return 0;
  return -p * Math.log2(p) - (1 - p) * Math.log2(1 - p);
}

export class CascadeProtocol implements NodeProtocol, KeyListener {
  readonly name: string;
  readonly owner: QKDNode;
  readonly bb84: BB84Protocol;
  another: CascadeProtocol | null = null;

  /** Reconciled keys ready for applications (sender side) */
  readonly validKeys: CompletedKey[] = [];
  /** Secure bits per second of every reconciled key */
  readonly throughputs: number[] = [];
  latency = 0;
  disclosedBitsCounter = 0;
  stopped = false;

  constructor(owner: QKDNode, name: string, bb84: BB84Protocol) {
    this.owner = owner;
    this.name = name;
    this.bb84 = bb84;
    bb84.upperLayer = this;
  }

  init(): void {
    if (!this.another) {
      throw new KernelError({
        code: HarnessErrorCode.PROTOCOL_NOT_PAIRED,
        message: `Cascade instance ${this.name} was never paired`,
      });
    }
  }

  /** Request `frameCount` reconciled keys of `keyLength` raw bits */
  push(keyLength: number, frameCount: number, runTime?: Picoseconds): boolean {
    if (this.stopped) return false;
    return this.bb84.push(keyLength, frameCount, runTime);
  }

  stop(): void {
    this.stopped = true;
  }

  onKeyCompleted(key: CompletedKey): void {
    if (this.stopped) return;

    const n = key.bits.length;
    const h = binaryEntropy(key.errorRate);
    const disclosed = Math.ceil(CASCADE_EFFICIENCY * h * n);
    const finalLength = Math.floor(n - disclosed - n * h);
    this.disclosedBitsCounter += disclosed;

    const roundTrip = this.roundTripDelay();
    const latency = key.latency + toSeconds(CASCADE_PASSES * roundTrip);
    this.latency = latency;

    if (finalLength <= 0 || latency <= 0) {
      this.throughputs.push(0);
      return;
    }

    this.throughputs.push(finalLength / latency);
    this.validKeys.push({
      ...key,
      bits: key.bits.slice(0, finalLength),
      latency,
    });
  }

  private roundTripDelay(): Picoseconds {
    const peer = this.another;
    if (!peer) return 0;
    const forward = this.owner.cchannels[peer.owner.name];
    const backward = peer.owner.cchannels[this.owner.name];
    return (forward?.delay ?? 0) + (backward?.delay ?? 0);
  }
}

/**
 * Pair two Cascade instances. Their BB84 layers must already be paired
 * with each other.
 */
export function pairCascadeProtocols(a: CascadeProtocol, b: CascadeProtocol): void {
  if (a.bb84.another !== b.bb84) {
    throw new ConfigurationError({
      code: HarnessErrorCode.MISSING_CHANNEL,
      message: `Cannot pair ${a.name} with ${b.name}: their BB84 layers are not paired`,
    });
  }
  a.another = b;
  b.another = a;
}

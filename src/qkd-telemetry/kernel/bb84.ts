/**
 * QKD Telemetry - Kernel: BB84 Key Exchange
 *
 * Frame-based model of prepare-and-measure BB84 between a sender and a
 * receiver node. Each frame the sender fires `frequency * frame` pulses;
 * clicks at the receiver follow from mu, fibre transmittance, detector
 * efficiency and dark counts. Sifting completes after a classical round
 * trip, and a key is emitted once enough sifted bits accumulate.
 */

import { Picoseconds, PS_PER_MS, PS_PER_SECOND, toSeconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { ConfigurationError, KernelError } from '../utils/errors';
import { NodeProtocol, QKDNode } from './node';

// ============================================
// TYPES
// ============================================

export type Bb84Role = 'sender' | 'receiver';

export interface CompletedKey {
  bits: number[];
  /** Measured QBER of this key */
  errorRate: number;
  completedAt: Picoseconds;
  /** Seconds spent producing the key */
  latency: number;
}

/** Upper protocol layer receiving finished keys */
export interface KeyListener {
  onKeyCompleted(key: CompletedKey): void;
}

interface KeyRequest {
  keyLength: number;
  remaining: number;
  expiresAt: Picoseconds;
}

export interface Bb84Parameters {
  /** Length of one measurement frame (ps) */
  frameDuration: Picoseconds;
  /** Intrinsic optical misalignment error */
  misalignment: number;
  /** Half-width of the uniform noise added to each key's QBER */
  qberNoise: number;
}

export const DEFAULT_BB84_PARAMETERS: Bb84Parameters = {
  frameDuration: PS_PER_MS,
  misalignment: 0.015,
  qberNoise: 0.004,
};

/** QBER produced by a full intercept-resend attack */
export const INTERCEPT_RESEND_QBER = 0.25;

// ============================================
// BB84 PROTOCOL
// ============================================

export class BB84Protocol implements NodeProtocol {
  readonly name: string;
  readonly owner: QKDNode;
  role: Bb84Role | null = null;
  another: BB84Protocol | null = null;

  /** QBER of every completed key */
  readonly errorRates: number[] = [];
  /** Bits per second of every completed key */
  readonly throughputs: number[] = [];
  /** Latency of the last completed key (s) */
  latency = 0;
  /** Sifted bits of the key under construction */
  keyBits: number[] = [];
  /** Completed keys, kept only while no upper layer is attached */
  readonly validKeys: CompletedKey[] = [];
  upperLayer: KeyListener | null = null;

  working = false;
  stopped = false;
  /** X-basis error rate reported by the phase modulator */
  phaseErrorRate = 0;
  /** Fraction of qubits intercepted and resent by an eavesdropper */
  interceptFraction = 0;

  private readonly params: Bb84Parameters;
  private requests: KeyRequest[] = [];
  private roundStart: Picoseconds = 0;

  constructor(owner: QKDNode, name: string, params?: Partial<Bb84Parameters>) {
    this.owner = owner;
    this.name = name;
    this.params = { ...DEFAULT_BB84_PARAMETERS, ...params };
  }

  init(): void {
    if (!this.another || !this.role) {
      throw new KernelError({
        code: HarnessErrorCode.PROTOCOL_NOT_PAIRED,
        message: `BB84 instance ${this.name} was never paired`,
      });
    }
  }

  /**
   * Request `keyCount` keys of `keyLength` bits. The request is dropped
   * once `runTime` ps have elapsed. Returns false when the link is down.
   */
  push(keyLength: number, keyCount: number, runTime?: Picoseconds): boolean {
    if (this.role !== 'sender') {
      throw new KernelError({
        code: HarnessErrorCode.PROTOCOL_NOT_PAIRED,
        message: `Only the sender side of ${this.name} accepts key requests`,
      });
    }
    if (!this.activePeer()) return false;

    const now = this.owner.timeline.now();
    this.requests.push({
      keyLength,
      remaining: keyCount,
      expiresAt: runTime === undefined ? Number.POSITIVE_INFINITY : now + runTime,
    });

    if (!this.working) {
      this.startProtocol();
    }
    return true;
  }

  /** Halt for the rest of the run */
  stop(): void {
    this.stopped = true;
    this.working = false;
    this.requests = [];
  }

  /** Outstanding key requests */
  get pendingRequests(): number {
    return this.requests.length;
  }

  // ============================================
  // ROUND LOGIC
  // ============================================

  private startProtocol(): void {
    this.working = true;
    this.roundStart = this.owner.timeline.now();
    this.scheduleFrame();
  }

  private scheduleFrame(): void {
    const timeline = this.owner.timeline;
    timeline.schedule(timeline.now() + this.params.frameDuration, () => this.runFrame(), this.name);
  }

  private runFrame(): void {
    const peer = this.activePeer();
    this.dropExpiredRequests();

    if (!peer || this.requests.length === 0) {
      this.working = false;
      return;
    }

    const bits = this.measureFrame(peer);
    const timeline = this.owner.timeline;
    timeline.schedule(timeline.now() + this.roundTripDelay(peer), () => this.applySifting(bits), this.name);

    this.scheduleFrame();
  }

  private measureFrame(peer: BB84Protocol): number[] {
    const rng = this.owner.timeline.rng;
    const pulses = Math.round(
      (this.owner.lightSource.frequency * this.params.frameDuration) / PS_PER_SECOND
    );
    const { signal, dark } = this.clickProbabilities(peer);
    const pClick = 1 - (1 - signal) * (1 - dark);

    const detections = rng.binomial(pulses, pClick);
    const sifted = rng.binomial(detections, 0.5);

    const bits: number[] = [];
    for (let i = 0; i < sifted; i++) {
      bits.push(rng.chance(0.5) ? 1 : 0);
    }
    return bits;
  }

  private applySifting(bits: number[]): void {
    const peer = this.activePeer();
    if (!peer) return;

    this.keyBits.push(...bits);
    peer.keyBits.push(...bits);
    this.completeKeys(peer);
  }

  private completeKeys(peer: BB84Protocol): void {
    for (;;) {
      const request = this.requests[0];
      if (!request || this.keyBits.length < request.keyLength) return;

      const bits = this.keyBits.slice(0, request.keyLength);
      this.keyBits = this.keyBits.slice(request.keyLength);
      peer.keyBits = peer.keyBits.slice(request.keyLength);

      const now = this.owner.timeline.now();
      const latency = toSeconds(now - this.roundStart);
      this.roundStart = now;

      const errorRate = this.estimateErrorRate(peer);
      const throughput = latency > 0 ? request.keyLength / latency : 0;
      for (const side of [this, peer]) {
        side.errorRates.push(errorRate);
        side.throughputs.push(throughput);
        side.latency = latency;
      }

      const key: CompletedKey = { bits, errorRate, completedAt: now, latency };
      if (this.upperLayer) {
        this.upperLayer.onKeyCompleted(key);
      } else {
        this.validKeys.push(key);
      }

      request.remaining--;
      if (request.remaining <= 0) {
        this.requests.shift();
      }
    }
  }

  private dropExpiredRequests(): void {
    const now = this.owner.timeline.now();
    this.requests = this.requests.filter(r => r.expiresAt > now);
  }

  // ============================================
  // PHYSICS
  // ============================================

  /** Per-pulse click probabilities at the receiver */
  private clickProbabilities(peer: BB84Protocol): { signal: number; dark: number } {
    const channel = this.owner.qchannels[peer.owner.name];
    const detectors = peer.owner.qsDetector.clickModel();
    const reference = detectors[0];
    if (!channel || !reference) {
      return { signal: 0, dark: 0 };
    }

    const mu = this.owner.lightSource.meanPhotonNum;
    const signal = 1 - Math.exp(-mu * channel.transmittance() * reference.efficiency);
    const gate = reference.timeResolution / PS_PER_SECOND;
    const dark = Math.min(1, reference.darkCountRate * gate * detectors.length);
    return { signal, dark };
  }

  private estimateErrorRate(peer: BB84Protocol): number {
    const { signal, dark } = this.clickProbabilities(peer);
    const darkContribution = signal + dark > 0 ? (0.5 * dark) / (signal + dark) : 0;
    const intrinsic =
      this.params.misalignment + this.owner.lightSource.phaseError / 2 + darkContribution;

    const intercept = Math.max(this.interceptFraction, peer.interceptFraction);
    const base = intercept * INTERCEPT_RESEND_QBER + (1 - intercept) * intrinsic;

    const noise = this.owner.timeline.rng.nextFloat(-this.params.qberNoise, this.params.qberNoise);
    return Math.min(0.5, Math.max(0, base + noise));
  }

  private roundTripDelay(peer: BB84Protocol): Picoseconds {
    const forward = this.owner.cchannels[peer.owner.name];
    const backward = peer.owner.cchannels[this.owner.name];
    return (forward?.delay ?? 0) + (backward?.delay ?? 0);
  }

  /** Paired peer, when both ends can still exchange photons */
  private activePeer(): BB84Protocol | null {
    const peer = this.another;
    if (!peer || this.stopped || peer.stopped) return null;
    if (this.owner.isOffline || peer.owner.isOffline) return null;
    return peer;
  }
}

// ============================================
// PAIRING
// ============================================

/**
 * Pair a sender and receiver over the channels registered between their
 * nodes. Missing channels are a configuration error.
 */
export function pairBb84Protocols(sender: BB84Protocol, receiver: BB84Protocol): void {
  const a = sender.owner;
  const b = receiver.owner;

  const missing: string[] = [];
  if (!a.qchannels[b.name]) missing.push(`quantum ${a.name}->${b.name}`);
  if (!a.cchannels[b.name]) missing.push(`classical ${a.name}->${b.name}`);
  if (!b.cchannels[a.name]) missing.push(`classical ${b.name}->${a.name}`);

  if (missing.length > 0) {
    throw new ConfigurationError({
      code: HarnessErrorCode.MISSING_CHANNEL,
      message: `Cannot pair ${sender.name} with ${receiver.name}: missing ${missing.join(', ')}`,
      details: { sender: a.name, receiver: b.name, missing },
    });
  }

  sender.role = 'sender';
  receiver.role = 'receiver';
  sender.another = receiver;
  receiver.another = sender;
}

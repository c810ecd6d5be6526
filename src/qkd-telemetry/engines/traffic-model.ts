/**
 * QKD Telemetry - Traffic & Consumption Model
 *
 * Periodic key requests and periodic application consumption on one
 * link. An empty buffer is counted as starvation, never raised.
 */

import { Picoseconds } from '../types/common';
import { ScenarioContext, TrafficConfig } from '../types/scenario';
import { Timeline } from '../kernel/timeline';
import { KeySource, LinkProtocols, keySourceOf } from './protocol-attachment';
import { recordStarvation } from './scenario-context';
import { scheduleEvery } from './scheduling-adapter';

export class TrafficModel {
  private readonly timeline: Timeline;
  private readonly protocols: LinkProtocols;
  private readonly context: ScenarioContext;
  private readonly config: TrafficConfig;

  constructor(
    timeline: Timeline,
    protocols: LinkProtocols,
    context: ScenarioContext,
    config: TrafficConfig
  ) {
    this.timeline = timeline;
    this.protocols = protocols;
    this.context = context;
    this.config = config;
  }

  private get source(): KeySource {
    return keySourceOf(this.protocols);
  }

  /** Ask the protocol layer for a batch of keys */
  requestKeys(): boolean {
    const { keyLength, keysPerRequest, requestInterval } = this.config;
    return this.source.push(keyLength, keysPerRequest, requestInterval);
  }

  /**
   * Drain `consumeKeys` keys, oldest first. Returns the number removed.
   */
  consume(): number {
    const buffer = this.source.validKeys;
    if (buffer.length < this.config.consumeKeys) {
      recordStarvation(this.context, this.protocols.link.name);
      return 0;
    }
    buffer.splice(0, this.config.consumeKeys);
    return this.config.consumeKeys;
  }

  /** Register both periodic actions over [0, end] */
  schedule(end: Picoseconds): void {
    const owner = `traffic:${this.protocols.link.name}`;
    scheduleEvery(this.timeline, 0, this.config.requestInterval, end, () => this.requestKeys(), owner);
    scheduleEvery(this.timeline, 0, this.config.consumeInterval, end, () => this.consume(), owner);
  }
}

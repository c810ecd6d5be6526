/**
 * QKD Telemetry - Kernel: Timeline
 *
 * Discrete-event queue keyed by integer picoseconds. Events at the same
 * time run in insertion order. Events with time <= stopTime are executed.
 */

import { Picoseconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { KernelError } from '../utils/errors';
import { SeededRandom } from './random';

// ============================================
// TYPES
// ============================================

/** Anything the timeline initializes before running */
export interface Entity {
  readonly name: string;
  init(): void;
}

/** A scheduled callback */
export interface TimelineEvent {
  time: Picoseconds;
  /** Insertion sequence, breaks ties between equal times */
  seq: number;
  action: () => void;
  /** Optional owner name, for diagnostics */
  owner?: string;
}

// ============================================
// EVENT QUEUE
// ============================================

/** Binary min-heap ordered by (time, seq) */
class EventQueue {
  private heap: TimelineEvent[] = [];

  get size(): number {
    return this.heap.length;
  }

  push(event: TimelineEvent): void {
    this.heap.push(event);
    this.siftUp(this.heap.length - 1);
  }

  peek(): TimelineEvent | undefined {
    return this.heap[0];
  }

  pop(): TimelineEvent | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  private less(a: TimelineEvent, b: TimelineEvent): boolean {
    return a.time < b.time || (a.time === b.time && a.seq < b.seq);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (!this.less(this.heap[i], this.heap[parent])) break;
      [this.heap[i], this.heap[parent]] = [this.heap[parent], this.heap[i]];
      i = parent;
    }
  }

  private siftDown(index: number): void {
    let i = index;
    const n = this.heap.length;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && this.less(this.heap[left], this.heap[smallest])) smallest = left;
      if (right < n && this.less(this.heap[right], this.heap[smallest])) smallest = right;
      if (smallest === i) return;
      [this.heap[i], this.heap[smallest]] = [this.heap[smallest], this.heap[i]];
      i = smallest;
    }
  }
}

// ============================================
// TIMELINE
// ============================================

export class Timeline {
  readonly stopTime: Picoseconds;
  readonly rng: SeededRandom;

  private queue = new EventQueue();
  private entities = new Map<string, Entity>();
  private currentTime: Picoseconds = 0;
  private sequence = 0;
  private executed = 0;

  constructor(stopTime: Picoseconds = Number.POSITIVE_INFINITY, seed = 0) {
    this.stopTime = stopTime;
    this.rng = new SeededRandom(seed);
  }

  /** Reseed the shared random source */
  seed(seed: number): void {
    this.rng.reseed(seed);
  }

  now(): Picoseconds {
    return this.currentTime;
  }

  /** Number of events executed so far */
  get eventsExecuted(): number {
    return this.executed;
  }

  /** Number of events still queued */
  get pendingEvents(): number {
    return this.queue.size;
  }

  addEntity(entity: Entity): void {
    if (this.entities.has(entity.name)) {
      throw new KernelError({
        code: HarnessErrorCode.DUPLICATE_NAME,
        message: `Entity ${entity.name} already registered`,
      });
    }
    this.entities.set(entity.name, entity);
  }

  getEntityByName(name: string): Entity | undefined {
    return this.entities.get(name);
  }

  /**
   * Schedule `action` at absolute time `time`
   */
  schedule(time: Picoseconds, action: () => void, owner?: string): TimelineEvent {
    if (!Number.isInteger(time) || time < 0) {
      throw new KernelError({
        code: HarnessErrorCode.INVALID_EVENT_TIME,
        message: `Event time must be a non-negative integer, got ${time}`,
        details: { owner },
      });
    }
    if (time < this.currentTime) {
      throw new KernelError({
        code: HarnessErrorCode.EVENT_IN_PAST,
        message: `Cannot schedule at ${time} ps, current time is ${this.currentTime} ps`,
        details: { owner },
      });
    }

    const event: TimelineEvent = { time, seq: this.sequence++, action, owner };
    this.queue.push(event);
    return event;
  }

  /** Initialize every registered entity, in registration order */
  init(): void {
    for (const entity of this.entities.values()) {
      entity.init();
    }
  }

  /**
   * Execute events in order until the queue is empty or the next event
   * lies beyond stopTime. Returns the number of events executed.
   */
  run(): number {
    const before = this.executed;

    for (;;) {
      const next = this.queue.peek();
      if (!next || next.time > this.stopTime) break;

      this.queue.pop();
      this.currentTime = next.time;
      next.action();
      this.executed++;
    }

    return this.executed - before;
  }
}

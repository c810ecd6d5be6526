/**
 * QKD Telemetry - Scheduling Adapter
 *
 * Thin shim turning "once at t", "every dt over [start, end]" and
 * "re-arm after each run" into timeline registrations.
 */

import { Picoseconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { Timeline } from '../kernel/timeline';
import { ConfigurationError } from '../utils/errors';

/** Run `action` once at `time` */
export function scheduleAt(
  timeline: Timeline,
  time: Picoseconds,
  action: () => void,
  owner?: string
): void {
  timeline.schedule(time, action, owner);
}

function assertInterval(interval: Picoseconds): void {
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new ConfigurationError({
      code: HarnessErrorCode.INVALID_PARAMETER,
      message: `Interval must be a positive integer number of ps, got ${interval}`,
    });
  }
}

/**
 * Pre-register `action` at start, start + interval, ... while <= end.
 * Returns the number of events registered.
 */
export function scheduleEvery(
  timeline: Timeline,
  start: Picoseconds,
  interval: Picoseconds,
  end: Picoseconds,
  action: () => void,
  owner?: string
): number {
  assertInterval(interval);

  let count = 0;
  for (let t = start; t <= end; t += interval) {
    timeline.schedule(t, action, owner);
    count++;
  }
  return count;
}

/**
 * Self re-arming periodic action: the first run is at `first`, and each
 * run at t registers the next one at t + interval while that is <= end.
 * The callback receives the time it was scheduled for.
 */
export function scheduleRecurring(
  timeline: Timeline,
  first: Picoseconds,
  interval: Picoseconds,
  end: Picoseconds,
  action: (time: Picoseconds) => void,
  owner?: string
): void {
  assertInterval(interval);

  const arm = (t: Picoseconds) => {
    if (t > end) return;
    timeline.schedule(
      t,
      () => {
        action(t);
        arm(t + interval);
      },
      owner
    );
  };

  arm(first);
}

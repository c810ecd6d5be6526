/**
 * QKD Telemetry - Scheduling Adapter Tests
 */

import { HarnessErrorCode } from '../types/errors';
import { Timeline } from '../kernel/timeline';
import { scheduleAt, scheduleEvery, scheduleRecurring } from '../engines/scheduling-adapter';
import { errorCodeOf } from './helpers';

describe('Scheduling Adapter', () => {
  let tl: Timeline;
  let fired: number[];

  beforeEach(() => {
    tl = new Timeline();
    fired = [];
  });

  test('scheduleAt runs once', () => {
    scheduleAt(tl, 7, () => fired.push(tl.now()));
    tl.run();
    expect(fired).toEqual([7]);
  });

  test('scheduleEvery covers the closed interval', () => {
    const count = scheduleEvery(tl, 0, 10, 30, () => fired.push(tl.now()));
    expect(count).toBe(4);
    expect(tl.pendingEvents).toBe(4);

    tl.run();
    expect(fired).toEqual([0, 10, 20, 30]);
  });

  test('scheduleEvery stops before an end that is not a multiple', () => {
    expect(scheduleEvery(tl, 5, 10, 30, () => undefined)).toBe(3);
  });

  test('scheduleRecurring re-arms while t <= end', () => {
    scheduleRecurring(tl, 10, 10, 30, time => fired.push(time));
    expect(tl.pendingEvents).toBe(1);

    tl.run();
    expect(fired).toEqual([10, 20, 30]);
    expect(tl.pendingEvents).toBe(0);
  });

  test('scheduleRecurring passes its scheduled time', () => {
    const seen: Array<[number, number]> = [];
    scheduleRecurring(tl, 3, 4, 12, time => seen.push([time, tl.now()]));
    tl.run();
    expect(seen).toEqual([
      [3, 3],
      [7, 7],
      [11, 11],
    ]);
  });

  test('A first run beyond the end schedules nothing', () => {
    scheduleRecurring(tl, 40, 10, 30, () => undefined);
    expect(tl.pendingEvents).toBe(0);
  });

  test('Intervals must be positive integers', () => {
    expect(errorCodeOf(() => scheduleEvery(tl, 0, 0, 10, () => undefined))).toBe(
      HarnessErrorCode.INVALID_PARAMETER
    );
    expect(errorCodeOf(() => scheduleRecurring(tl, 0, 2.5, 10, () => undefined))).toBe(
      HarnessErrorCode.INVALID_PARAMETER
    );
  });
});

/**
 * QKD Telemetry - Scenario Context
 *
 * Explicit shared state of one run, handed by reference to the fault
 * injector, traffic model and sampler.
 */

import { FaultType, LinkName, Picoseconds } from '../types/common';
import { ScenarioContext } from '../types/scenario';

/**
 * Create the context of a run. `normal` never has a trigger.
 */
export function createScenarioContext(
  faultType: FaultType,
  triggerTime: Picoseconds | null
): ScenarioContext {
  return {
    faultType,
    triggerTime: faultType === 'normal' ? null : triggerTime,
    label: 'normal',
    faultState: 'idle',
    starvation: new Map(),
  };
}

/**
 * Label of a sample taken at `time`: `normal` before the trigger, the
 * scenario name at or after it. Depends on time alone, so it never
 * regresses.
 */
export function labelAt(context: ScenarioContext, time: Picoseconds): FaultType {
  if (context.triggerTime === null || time < context.triggerTime) {
    return 'normal';
  }
  return context.faultType;
}

export function recordStarvation(context: ScenarioContext, link: LinkName): void {
  context.starvation.set(link, (context.starvation.get(link) ?? 0) + 1);
}

export function starvationCount(context: ScenarioContext, link: LinkName): number {
  return context.starvation.get(link) ?? 0;
}

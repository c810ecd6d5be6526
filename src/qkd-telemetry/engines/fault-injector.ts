/**
 * QKD Telemetry - Fault Injector
 *
 * One-shot state machine per run: idle -> armed (trigger registered
 * before the kernel runs) -> fired (perturbation applied once, label
 * flipped). `fired` is terminal.
 */

import { toSeconds } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { Network } from '../types/network';
import { FaultScenario, FaultState, Perturbation, ScenarioContext } from '../types/scenario';
import { Timeline } from '../kernel/timeline';
import { getScenario } from '../scenarios';
import { ConfigurationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { scheduleAt } from './scheduling-adapter';

const log = createLogger('fault');

// ============================================
// FAULT INJECTOR
// ============================================

export class FaultInjector {
  private readonly timeline: Timeline;
  private readonly network: Network;
  private readonly context: ScenarioContext;
  private readonly scenario: FaultScenario | null;
  private perturbation: Perturbation | null = null;

  constructor(timeline: Timeline, network: Network, context: ScenarioContext) {
    this.timeline = timeline;
    this.network = network;
    this.context = context;
    this.scenario = context.faultType === 'normal' ? null : getScenario(context.faultType);
  }

  get state(): FaultState {
    return this.context.faultState;
  }

  /** Scenario driven by this injector, null for a normal run */
  get definition(): FaultScenario | null {
    return this.scenario;
  }

  /**
   * Resolve the target and register the trigger. A normal run has
   * nothing to arm and stays idle.
   */
  arm(): void {
    if (this.context.faultState !== 'idle') {
      throw new ConfigurationError({
        code: HarnessErrorCode.ALREADY_ARMED,
        message: `Fault injector for ${this.context.faultType} is already ${this.context.faultState}`,
      });
    }

    const trigger = this.context.triggerTime;
    if (!this.scenario || trigger === null) return;

    this.perturbation = this.scenario.prepare(this.network);
    scheduleAt(this.timeline, trigger, () => this.fire(), `fault:${this.scenario.type}`);
    this.context.faultState = 'armed';

    log.debug(`${this.scenario.name} armed for t=${toSeconds(trigger).toFixed(3)}s`);
  }

  /**
   * Apply the perturbation. Returns false when not armed.
   */
  fire(): boolean {
    if (this.context.faultState !== 'armed' || !this.scenario || !this.perturbation) {
      return false;
    }

    this.perturbation();
    this.context.label = this.scenario.type;
    this.context.faultState = 'fired';

    log.warn(
      `[FAULT ${this.scenario.type}] ${this.scenario.name} at t=${toSeconds(this.timeline.now()).toExponential(2)}s`
    );
    return true;
  }
}

// ============================================
// FACTORY FUNCTION
// ============================================

/**
 * Create a fault injector for the context's fault type
 */
export function createFaultInjector(
  timeline: Timeline,
  network: Network,
  context: ScenarioContext
): FaultInjector {
  return new FaultInjector(timeline, network, context);
}

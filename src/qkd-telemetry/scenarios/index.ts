/**
 * QKD Telemetry - Scenarios Index
 *
 * Registry of the five fault signatures.
 */

export * from './intercept-resend';
export * from './channel-degradation';
export * from './node-failure';
export * from './detector-blinding';
export * from './trojan-horse';

import { ActiveFaultType } from '../types/common';
import { FaultScenario } from '../types/scenario';
import { INTERCEPT_RESEND_SCENARIO } from './intercept-resend';
import { CHANNEL_DEGRADATION_SCENARIO } from './channel-degradation';
import { NODE_FAILURE_SCENARIO } from './node-failure';
import { DETECTOR_BLINDING_SCENARIO } from './detector-blinding';
import { TROJAN_HORSE_SCENARIO } from './trojan-horse';

export const FAULT_SCENARIOS: Readonly<Record<ActiveFaultType, FaultScenario>> = {
  qber: INTERCEPT_RESEND_SCENARIO,
  degrade: CHANNEL_DEGRADATION_SCENARIO,
  node_fail: NODE_FAILURE_SCENARIO,
  blinding: DETECTOR_BLINDING_SCENARIO,
  trojan: TROJAN_HORSE_SCENARIO,
};

/** Scenario definition for a fault type */
export function getScenario(type: ActiveFaultType): FaultScenario {
  return FAULT_SCENARIOS[type];
}

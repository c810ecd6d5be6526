/**
 * QKD Telemetry - Scenarios: Trojan Horse (trojan)
 */

import { FaultScenario } from '../types/scenario';
import { BB84Protocol } from '../kernel/bb84';
import { requireTargetNode } from './targets';

const TARGET = 'Koganei_B';

/** Reverse optical power while Eve probes the phase modulator (W) */
export const TROJAN_BACK_REFLECTION_POWER = 1e-3;

/** Phase-error rate induced by the probe pulses */
export const TROJAN_PHASE_ERROR_RATE = 0.02;

/**
 * Eve injects bright pulses backwards into Koganei_B and reads the
 * modulator settings from the reflection. Reverse power rises from fW
 * to mW; any reverse power above 1 uW is anomalous. QBER is untouched.
 */
export const TROJAN_HORSE_SCENARIO: FaultScenario = {
  type: 'trojan',
  name: 'Trojan Horse',
  description: 'Anomalous back-reflected power and a slight phase-error rise',
  target: { kind: 'node', node: TARGET },
  signature: ['back_reflection_power', 'phase_error_rate', 'back_reflection_alert'],

  prepare(network) {
    const node = requireTargetNode(network, TARGET, 'trojan');

    return () => {
      node.overrides.backReflectionPower = TROJAN_BACK_REFLECTION_POWER;
      for (const protocol of node.protocols) {
        if (protocol instanceof BB84Protocol) {
          protocol.phaseErrorRate = Math.max(protocol.phaseErrorRate, TROJAN_PHASE_ERROR_RATE);
        }
      }
    };
  },
};

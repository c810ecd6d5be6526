/**
 * QKD Telemetry - Scenarios: Intercept-Resend (qber)
 */

import { FaultScenario } from '../types/scenario';
import { INTERCEPT_RESEND_QBER } from '../kernel/bb84';
import { requirePrimaryBb84, requireTargetNode } from './targets';

const TARGET = 'Otemachi';

/**
 * Eve measures every qubit on the Otemachi link and resends a fresh
 * state. Both ends record a ~25% QBER observation immediately and every
 * later round measures the same (Tokyo QKD observed 2.4% -> 49.7%).
 * Detected by the classical 5% QBER threshold.
 */
export const INTERCEPT_RESEND_SCENARIO: FaultScenario = {
  type: 'qber',
  name: 'Intercept-Resend',
  description: 'Eavesdropper intercepts and resends every qubit; QBER jumps to ~25%',
  target: { kind: 'node', node: TARGET },
  signature: ['qber', 'error_count', 'key_rate_final'],

  prepare(network) {
    const node = requireTargetNode(network, TARGET, 'qber');
    const bb84 = requirePrimaryBb84(node, 'qber');

    return () => {
      for (const side of [bb84, bb84.another]) {
        if (!side || side.interceptFraction >= 1) continue;
        side.interceptFraction = 1;
        side.errorRates.push(INTERCEPT_RESEND_QBER);
      }
    };
  },
};

/**
 * QKD Telemetry - Scenarios: Trusted Node Failure (node_fail)
 */

import { FaultScenario } from '../types/scenario';
import { requireTargetNode } from './targets';

const TARGET = 'Hakusan';

/**
 * Trusted node Hakusan goes offline. Its links stop producing keys and
 * key management has to reroute around it.
 */
export const NODE_FAILURE_SCENARIO: FaultScenario = {
  type: 'node_fail',
  name: 'Trusted Node Failure',
  description: `${TARGET} goes offline and halts every attached protocol`,
  target: { kind: 'node', node: TARGET },
  signature: ['key_rate_sifted', 'key_rate_final', 'keys_buffer', 'starvation_events'],

  prepare(network) {
    const node = requireTargetNode(network, TARGET, 'node_fail');

    return () => {
      node.isOffline = true;
      for (const protocol of node.protocols) {
        protocol.stop();
      }
    };
  },
};

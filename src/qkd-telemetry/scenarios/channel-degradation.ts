/**
 * QKD Telemetry - Scenarios: Channel Degradation (degrade)
 */

import { DEGRADE_FACTOR, DEGRADE_TARGET_LINK } from '../types/network';
import { FaultScenario } from '../types/scenario';
import { requireTargetLink } from './targets';

/**
 * Fibre loss on Koganei_A -> Koganei_B triples (0.2 -> 0.6 dB/km).
 * Sifted and final key rates fall, QBER drifts up as dark counts weigh
 * more against the weaker signal.
 */
export const CHANNEL_DEGRADATION_SCENARIO: FaultScenario = {
  type: 'degrade',
  name: 'Channel Degradation',
  description: `Quantum channel attenuation multiplied by ${DEGRADE_FACTOR}`,
  target: { kind: 'link', link: DEGRADE_TARGET_LINK },
  signature: ['key_rate_sifted', 'key_rate_final', 'qber'],

  prepare(network) {
    const { quantumChannel } = requireTargetLink(network, DEGRADE_TARGET_LINK, 'degrade');

    return () => {
      quantumChannel.attenuation = quantumChannel.nominalAttenuation * DEGRADE_FACTOR;
    };
  },
};

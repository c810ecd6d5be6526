/**
 * QKD Telemetry - Scenarios: Detector Blinding (blinding)
 */

import { FaultScenario } from '../types/scenario';
import { requireTargetNode } from './targets';

const TARGET = 'Otemachi';

/** Dark-count rate of a detector held in linear mode by bright CW light */
export const BLINDED_DARK_COUNT_RATE = 5_000_000;

/**
 * Eve floods Otemachi's detectors with CW light so they leave Geiger
 * mode, then triggers clicks at will. QBER stays normal, which makes
 * this the dangerous case: only detector-level telemetry (dark counts,
 * efficiency) reveals it.
 */
export const DETECTOR_BLINDING_SCENARIO: FaultScenario = {
  type: 'blinding',
  name: 'Detector Blinding',
  description: 'Detectors saturated: efficiency 1.0, dark counts ~5e6/s, QBER unchanged',
  target: { kind: 'node', node: TARGET },
  signature: ['dark_count_rate', 'detector_efficiency', 'dark_count_delta'],

  prepare(network) {
    const node = requireTargetNode(network, TARGET, 'blinding');

    return () => {
      node.qsDetector.blind({ efficiency: 1.0, darkCountRate: BLINDED_DARK_COUNT_RATE });
      node.overrides.darkCountRate = BLINDED_DARK_COUNT_RATE;
      node.overrides.detectorEfficiency = 1.0;
    };
  },
};

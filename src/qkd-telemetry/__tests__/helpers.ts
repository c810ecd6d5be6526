/**
 * QKD Telemetry - Test Helpers
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { LinkName } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { Network, TOKYO_TOPOLOGY, TopologySpec } from '../types/network';
import { LabeledSample, TelemetrySample } from '../types/telemetry';
import { Timeline } from '../kernel/timeline';
import { buildNetwork } from '../engines/topology-builder';
import { LinkProtocols, attachProtocols } from '../engines/protocol-attachment';
import { ConfigurationError, KernelError } from '../utils/errors';

export interface TestNetwork {
  timeline: Timeline;
  network: Network;
  protocols: Map<LinkName, LinkProtocols>;
}

/** Built network with protocols attached, not yet initialized */
export function setupNetwork(
  options: { topology?: TopologySpec; reconciliation?: boolean; stopTime?: number; seed?: number } = {}
): TestNetwork {
  const timeline = new Timeline(options.stopTime, options.seed ?? 1);
  const network = buildNetwork(timeline, options.topology ?? TOKYO_TOPOLOGY);
  const protocols = attachProtocols(network, { reconciliation: options.reconciliation ?? true });
  return { timeline, network, protocols };
}

export function linkProtocols(setup: TestNetwork, link: LinkName): LinkProtocols {
  const found = setup.protocols.get(link);
  if (!found) throw new Error(`no protocols on ${link}`);
  return found;
}

/** Error code thrown by `fn`, or undefined when it does not throw */
export function errorCodeOf(fn: () => unknown): HarnessErrorCode | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigurationError || e instanceof KernelError) return e.code;
    throw e;
  }
  return undefined;
}

export function telemetrySample(overrides: Partial<TelemetrySample> = {}): TelemetrySample {
  return {
    timestamp_ps: 10_000_000_000,
    link: 'Koganei_A_Koganei_B',
    node: 'Koganei_A',
    qber: 0.012,
    key_rate_sifted: 120,
    key_rate_final: 700.5,
    detection_count: 120,
    error_count: 1,
    dark_count_rate: 100,
    detector_efficiency: 0.8,
    back_reflection_power: 0,
    phase_error_rate: 0,
    label: 'normal',
    fault_id: 0,
    keys_buffer: 3,
    starvation_events: 0,
    ...overrides,
  };
}

export function labeledSample(overrides: Partial<LabeledSample> = {}): LabeledSample {
  return {
    ...telemetrySample(overrides),
    fault_name: 'normal',
    ...overrides,
  };
}

/** Fresh temporary directory and its cleanup */
export function tempDir(): { path: string; cleanup: () => void } {
  const path = mkdtempSync(join(tmpdir(), 'qkd-telemetry-'));
  return { path, cleanup: () => rmSync(path, { recursive: true, force: true }) };
}

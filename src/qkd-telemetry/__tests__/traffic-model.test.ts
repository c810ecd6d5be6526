/**
 * QKD Telemetry - Traffic & Consumption Model Tests
 */

import { PS_PER_MS } from '../types/common';
import { DEFAULT_TRAFFIC_CONFIG, ScenarioContext } from '../types/scenario';
import { CompletedKey } from '../kernel/bb84';
import { createScenarioContext, starvationCount } from '../engines/scenario-context';
import { keySourceOf } from '../engines/protocol-attachment';
import { TrafficModel } from '../engines/traffic-model';
import { setLogLevel } from '../utils/logger';
import { TestNetwork, linkProtocols, setupNetwork } from './helpers';

const LINK = 'Koganei_A_Koganei_B';

function key(marker: number): CompletedKey {
  return { bits: [marker], errorRate: 0.015, completedAt: marker, latency: 0.01 };
}

beforeAll(() => setLogLevel('silent'));

describe('TrafficModel', () => {
  let setup: TestNetwork;
  let context: ScenarioContext;

  beforeEach(() => {
    setup = setupNetwork();
    context = createScenarioContext('normal', null);
  });

  function model(): TrafficModel {
    return new TrafficModel(setup.timeline, linkProtocols(setup, LINK), context, DEFAULT_TRAFFIC_CONFIG);
  }

  test('Consuming from an empty buffer counts starvation', () => {
    const traffic = model();
    expect(traffic.consume()).toBe(0);
    expect(traffic.consume()).toBe(0);
    expect(starvationCount(context, LINK)).toBe(2);
    expect(starvationCount(context, 'Hakusan_Hongo')).toBe(0);
  });

  test('Consumption drains the oldest keys first', () => {
    const traffic = model();
    const buffer = keySourceOf(linkProtocols(setup, LINK)).validKeys;
    buffer.push(key(1), key(2), key(3));

    expect(traffic.consume()).toBe(2);
    expect(buffer).toEqual([key(3)]);
    expect(starvationCount(context, LINK)).toBe(0);

    expect(traffic.consume()).toBe(0);
    expect(buffer).toHaveLength(1);
    expect(starvationCount(context, LINK)).toBe(1);
  });

  test('Keys are drawn from BB84 when no reconciliation layer is attached', () => {
    setup = setupNetwork({ reconciliation: false });
    const protocols = linkProtocols(setup, LINK);
    expect(keySourceOf(protocols)).toBe(protocols.sender);

    protocols.sender.validKeys.push(key(1), key(2));
    expect(model().consume()).toBe(2);
    expect(protocols.sender.validKeys).toHaveLength(0);
  });

  test('Requests go to the protocol layer', () => {
    const traffic = model();
    expect(traffic.requestKeys()).toBe(true);
    expect(linkProtocols(setup, LINK).sender.pendingRequests).toBe(1);
  });

  test('Requests are refused while the far end is offline', () => {
    linkProtocols(setup, LINK).link.nodeB.isOffline = true;
    expect(model().requestKeys()).toBe(false);
  });

  test('Both periodic actions cover [0, end]', () => {
    model().schedule(200 * PS_PER_MS);
    // requests at 0, 100, 200 ms; consumption at 0, 80, 160 ms
    expect(setup.timeline.pendingEvents).toBe(6);
  });

  test('Keys flow and are consumed over a short run', () => {
    setup = setupNetwork({ stopTime: 300 * PS_PER_MS });
    const traffic = model();
    setup.timeline.init();
    traffic.schedule(300 * PS_PER_MS);
    setup.timeline.run();

    const { senderReconciliation } = linkProtocols(setup, LINK);
    expect(senderReconciliation?.throughputs.length).toBeGreaterThan(0);
    // the buffer is always empty at t = 0
    expect(starvationCount(context, LINK)).toBeGreaterThanOrEqual(1);
  });
});

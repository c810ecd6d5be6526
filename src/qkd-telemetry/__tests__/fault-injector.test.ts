/**
 * QKD Telemetry - Fault Injector Tests
 *
 * State machine, target resolution and the five perturbations.
 */

import { FaultType } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { DEGRADE_FACTOR, TopologySpec } from '../types/network';
import { BB84Protocol } from '../kernel/bb84';
import { createScenarioContext, labelAt } from '../engines/scenario-context';
import { FaultInjector, createFaultInjector } from '../engines/fault-injector';
import {
  BLINDED_DARK_COUNT_RATE,
  CHANNEL_DEGRADATION_SCENARIO,
  FAULT_SCENARIOS,
  TROJAN_BACK_REFLECTION_POWER,
  TROJAN_PHASE_ERROR_RATE,
  getScenario,
} from '../scenarios';
import { setLogLevel } from '../utils/logger';
import { TestNetwork, errorCodeOf, linkProtocols, setupNetwork } from './helpers';

const TRIGGER = 1_000;

function injectorFor(fault: FaultType, setup: TestNetwork): FaultInjector {
  const context = createScenarioContext(fault, TRIGGER);
  return createFaultInjector(setup.timeline, setup.network, context);
}

function node(setup: TestNetwork, name: string) {
  const found = setup.network.nodes.get(name);
  if (!found) throw new Error(`no node ${name}`);
  return found;
}

beforeAll(() => setLogLevel('silent'));

describe('Scenario context', () => {
  test('Normal runs carry no trigger', () => {
    const context = createScenarioContext('normal', TRIGGER);
    expect(context.triggerTime).toBeNull();
    expect(labelAt(context, 5 * TRIGGER)).toBe('normal');
  });

  test('Label flips at the trigger and never regresses', () => {
    const context = createScenarioContext('trojan', TRIGGER);
    expect(labelAt(context, TRIGGER - 1)).toBe('normal');
    expect(labelAt(context, TRIGGER)).toBe('trojan');
    expect(labelAt(context, TRIGGER + 1)).toBe('trojan');
  });
});

describe('Scenario registry', () => {
  test('Every active fault has a scenario of its own type', () => {
    for (const [type, scenario] of Object.entries(FAULT_SCENARIOS)) {
      expect(scenario.type).toBe(type);
      expect(scenario.signature.length).toBeGreaterThan(0);
    }
    expect(getScenario('degrade')).toBe(CHANNEL_DEGRADATION_SCENARIO);
  });
});

describe('FaultInjector', () => {
  let setup: TestNetwork;

  beforeEach(() => {
    setup = setupNetwork();
  });

  test('Normal stays idle and schedules nothing', () => {
    const injector = injectorFor('normal', setup);
    injector.arm();

    expect(injector.state).toBe('idle');
    expect(injector.definition).toBeNull();
    expect(setup.timeline.pendingEvents).toBe(0);
    expect(injector.fire()).toBe(false);
  });

  test('Arming registers exactly one trigger', () => {
    const injector = injectorFor('qber', setup);
    injector.arm();

    expect(injector.state).toBe('armed');
    expect(setup.timeline.pendingEvents).toBe(1);
  });

  test('Double arming is a configuration error', () => {
    const injector = injectorFor('blinding', setup);
    injector.arm();
    expect(errorCodeOf(() => injector.arm())).toBe(HarnessErrorCode.ALREADY_ARMED);
  });

  test('Fires once at the trigger time', () => {
    const injector = injectorFor('qber', setup);
    injector.arm();
    setup.timeline.run();

    expect(setup.timeline.now()).toBe(TRIGGER);
    expect(injector.state).toBe('fired');
    expect(injector.fire()).toBe(false);
  });

  test('Missing target is reported before the kernel runs', () => {
    const withoutHakusan: TopologySpec = {
      nodes: ['Koganei_A', 'Koganei_B'],
      links: [{ a: 'Koganei_A', b: 'Koganei_B', distance: 7_000 }],
    };
    const small = setupNetwork({ topology: withoutHakusan });
    const injector = injectorFor('node_fail', small);

    expect(errorCodeOf(() => injector.arm())).toBe(HarnessErrorCode.MISSING_FAULT_TARGET);
    expect(injector.state).toBe('idle');
    expect(small.timeline.pendingEvents).toBe(0);
  });

  describe('Perturbations', () => {
    function fire(fault: FaultType): void {
      const injector = injectorFor(fault, setup);
      injector.arm();
      setup.timeline.run();
    }

    test('qber: both ends of the Otemachi link record 25% and stay intercepted', () => {
      fire('qber');
      const { sender, receiver } = linkProtocols(setup, 'Otemachi_Hakusan');
      for (const side of [sender, receiver]) {
        expect(side.errorRates).toEqual([0.25]);
        expect(side.interceptFraction).toBe(1);
      }
      expect(linkProtocols(setup, 'Koganei_B_Otemachi').sender.interceptFraction).toBe(0);
    });

    test('degrade: attenuation triples, repeated application is idempotent', () => {
      const perturb = CHANNEL_DEGRADATION_SCENARIO.prepare(setup.network);
      perturb();
      perturb();
      const { quantumChannel } = linkProtocols(setup, 'Koganei_A_Koganei_B').link;
      expect(quantumChannel.attenuation).toBe(quantumChannel.nominalAttenuation * DEGRADE_FACTOR);
    });

    test('node_fail: Hakusan goes offline and every protocol stops', () => {
      fire('node_fail');
      const hakusan = node(setup, 'Hakusan');
      expect(hakusan.isOffline).toBe(true);
      expect(hakusan.protocols).toHaveLength(4);

      const { sender, senderReconciliation } = linkProtocols(setup, 'Hakusan_Hongo');
      expect(sender.stopped).toBe(true);
      expect(senderReconciliation?.stopped).toBe(true);
      expect(linkProtocols(setup, 'Otemachi_Hakusan').receiver.stopped).toBe(true);
      expect(linkProtocols(setup, 'Otemachi_Hakusan').sender.stopped).toBe(false);
    });

    test('blinding: every Otemachi detector saturates and overrides are cached', () => {
      fire('blinding');
      const otemachi = node(setup, 'Otemachi');
      for (const detector of otemachi.qsDetector.detectors) {
        expect(detector.efficiency).toBe(1);
        expect(detector.darkCountRate).toBe(BLINDED_DARK_COUNT_RATE);
      }
      expect(otemachi.overrides).toEqual({ darkCountRate: 5_000_000, detectorEfficiency: 1 });
      expect(otemachi.qsDetector.isBlinded).toBe(true);
      expect(otemachi.qsDetector.clickModel()[0]).toEqual({
        efficiency: 0.8,
        darkCountRate: 100,
        timeResolution: 100,
      });
      expect(node(setup, 'Hakusan').qsDetector.detectors[0].darkCountRate).toBe(100);
    });

    test('trojan: back-reflection and phase error on Koganei_B only', () => {
      fire('trojan');
      const koganeiB = node(setup, 'Koganei_B');
      expect(koganeiB.overrides.backReflectionPower).toBe(TROJAN_BACK_REFLECTION_POWER);

      const bb84s = koganeiB.protocols.filter(
        (p): p is BB84Protocol => p instanceof BB84Protocol
      );
      expect(bb84s).toHaveLength(2);
      for (const bb84 of bb84s) {
        expect(bb84.phaseErrorRate).toBe(TROJAN_PHASE_ERROR_RATE);
      }
      expect(linkProtocols(setup, 'Otemachi_Hakusan').sender.phaseErrorRate).toBe(0);
      expect(node(setup, 'Otemachi').overrides.backReflectionPower).toBeUndefined();
    });
  });
});

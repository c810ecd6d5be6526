/**
 * QKD Telemetry - Protocol Attachment
 *
 * Instantiates and pairs one BB84 pair (and optionally one Cascade pair)
 * per link. The transmitting node of each link is the BB84 sender.
 */

import { LinkName } from '../types/common';
import { Network, NetworkLink } from '../types/network';
import { BB84Protocol, CompletedKey, pairBb84Protocols } from '../kernel/bb84';
import { CascadeProtocol, pairCascadeProtocols } from '../kernel/cascade';
import { BB84_SLOT, RECONCILIATION_SLOT } from '../kernel/node';

/** What the traffic model pushes to and drains from */
export interface KeySource {
  push(keyLength: number, keyCount: number, runTime?: number): boolean;
  readonly validKeys: CompletedKey[];
}

export interface LinkProtocols {
  link: NetworkLink;
  sender: BB84Protocol;
  receiver: BB84Protocol;
  senderReconciliation: CascadeProtocol | null;
  receiverReconciliation: CascadeProtocol | null;
}

/** Reconciliation layer when attached, else the BB84 sender */
export function keySourceOf(protocols: LinkProtocols): KeySource {
  return protocols.senderReconciliation ?? protocols.sender;
}

/**
 * Attach protocols to every link, in link order. Stack slots hold the
 * most recently attached instance; every instance is kept in
 * `node.protocols`.
 */
export function attachProtocols(
  network: Network,
  options: { reconciliation: boolean }
): Map<LinkName, LinkProtocols> {
  const attached = new Map<LinkName, LinkProtocols>();

  for (const link of network.links) {
    const { nodeA, nodeB, name } = link;

    const sender = new BB84Protocol(nodeA, `bb84_${name}_alice`);
    const receiver = new BB84Protocol(nodeB, `bb84_${name}_bob`);
    nodeA.attach(BB84_SLOT, sender);
    nodeB.attach(BB84_SLOT, receiver);
    pairBb84Protocols(sender, receiver);

    let senderReconciliation: CascadeProtocol | null = null;
    let receiverReconciliation: CascadeProtocol | null = null;
    if (options.reconciliation) {
      senderReconciliation = new CascadeProtocol(nodeA, `cascade_${name}_alice`, sender);
      receiverReconciliation = new CascadeProtocol(nodeB, `cascade_${name}_bob`, receiver);
      nodeA.attach(RECONCILIATION_SLOT, senderReconciliation);
      nodeB.attach(RECONCILIATION_SLOT, receiverReconciliation);
      pairCascadeProtocols(senderReconciliation, receiverReconciliation);
    }

    attached.set(name, { link, sender, receiver, senderReconciliation, receiverReconciliation });
  }

  return attached;
}

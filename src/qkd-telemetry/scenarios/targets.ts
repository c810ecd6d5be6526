/**
 * QKD Telemetry - Scenarios: Target Resolution
 */

import { ActiveFaultType, LinkName, NodeName } from '../types/common';
import { HarnessErrorCode } from '../types/errors';
import { Network, NetworkLink } from '../types/network';
import { BB84Protocol } from '../kernel/bb84';
import { BB84_SLOT, QKDNode } from '../kernel/node';
import { ConfigurationError } from '../utils/errors';

export function requireTargetNode(
  network: Network,
  name: NodeName,
  fault: ActiveFaultType
): QKDNode {
  const node = network.nodes.get(name);
  if (!node) {
    throw new ConfigurationError({
      code: HarnessErrorCode.MISSING_FAULT_TARGET,
      message: `Fault ${fault} targets node ${name}, which is not in the topology`,
      details: { fault, node: name },
    });
  }
  return node;
}

export function requireTargetLink(
  network: Network,
  name: LinkName,
  fault: ActiveFaultType
): NetworkLink {
  const link = network.links.find(l => l.name === name);
  if (!link) {
    throw new ConfigurationError({
      code: HarnessErrorCode.MISSING_FAULT_TARGET,
      message: `Fault ${fault} targets link ${name}, which is not in the topology`,
      details: { fault, link: name },
    });
  }
  return link;
}

/** Paired BB84 instance in the node's first stack slot */
export function requirePrimaryBb84(node: QKDNode, fault: ActiveFaultType): BB84Protocol {
  const protocol = node.protocolStack[BB84_SLOT];
  if (!(protocol instanceof BB84Protocol) || !protocol.another) {
    throw new ConfigurationError({
      code: HarnessErrorCode.MISSING_FAULT_TARGET,
      message: `Fault ${fault} needs a paired BB84 instance on ${node.name}`,
      details: { fault, node: node.name },
    });
  }
  return protocol;
}

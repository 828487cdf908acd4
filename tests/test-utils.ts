import { OscAccess, createRoot } from '../src/models/addressTree.js';
import type { AddressTree, EndpointDescriptor } from '../src/models/addressTree.js';
import { createHostInfo } from '../src/models/hostInfo.js';
import type { HostInfoInput } from '../src/models/hostInfo.js';
import { osc } from '../src/models/oscValue.js';

export const TEST_HOST: HostInfoInput = {
  name: 'Test Rig',
  oscIp: '127.0.0.1',
  oscPort: 6666,
  extensions: ['ACCESS', 'VALUE', 'RANGE', 'DESCRIPTION'],
};

// Leaf used across resolver and HTTP tests: float 1.0, range 0-10, cm.
export const DISTANCE_ENDPOINT: EndpointDescriptor = {
  path: '/group/distance',
  value: osc.float(1),
  description: 'Distance sensor',
  min: 0,
  max: 10,
  access: OscAccess.ReadWrite,
  unit: 'distance.cm',
};

export function buildTree(
  descriptors: EndpointDescriptor[],
  hostInfo: HostInfoInput | null = TEST_HOST
): AddressTree {
  const root = createRoot(hostInfo ? createHostInfo(hostInfo) : undefined);
  for (const descriptor of descriptors) root.insert(descriptor);
  return root.publish();
}

export function sampleTree(): AddressTree {
  return buildTree([
    DISTANCE_ENDPOINT,
    { path: '/group/label', value: osc.string('idle'), access: OscAccess.ReadOnly },
    { path: '/trigger', value: osc.bool(false), access: OscAccess.WriteOnly },
  ]);
}

import { OscAccess, createRoot } from './models/addressTree.js';
import type { AddressTree } from './models/addressTree.js';
import { createHostInfo } from './models/hostInfo.js';
import type { HostInfoInput } from './models/hostInfo.js';
import { osc } from './models/oscValue.js';

// Demo tree: two endpoints at the root.
export function buildDemoTree(hostInfo: HostInfoInput): AddressTree {
  const root = createRoot(createHostInfo(hostInfo));

  root.insert({
    path: '/endpoint1',
    value: osc.float(0),
    access: OscAccess.ReadWrite,
    unit: 'distance.cm',
    description: 'This is endpoint1',
    min: 0,
    max: 100,
  });
  root.insert({
    path: '/endpoint2',
    value: osc.int(0),
    access: OscAccess.ReadOnly,
    description: 'This is endpoint2',
  });

  return root.publish();
}

import assert from 'node:assert/strict';
import { test } from 'node:test';

import {
  createClusterRoot,
  createDeviceNode,
  freeBlockSizes,
  insertDevicePath,
  type CapacityMap,
  type DeviceNode
} from '../src/deviceTree';

function leaf(kind: 'host' | 'vnode', name: string, capacityCores: number, freeCores: number, freeGpus = 0): DeviceNode {
  const node = createDeviceNode(kind, name, { cores: capacityCores, gpus: 2 });
  node.free = { cores: freeCores, gpus: freeGpus };
  return node;
}

function attach(parent: DeviceNode, ...children: DeviceNode[]): DeviceNode {
  for (const child of children) {
    parent.children.set(child.name, child);
  }
  return parent;
}

test('leaf reports its free count, or nothing when exhausted', () => {
  assert.deepEqual(freeBlockSizes(leaf('vnode', 'a', 8, 4), 'cores'), [4]);
  assert.deepEqual(freeBlockSizes(leaf('vnode', 'a', 8, 0), 'cores'), []);
});

test('fully free siblings below the root merge into one block', () => {
  const socket = attach(createDeviceNode('socket', 's0', { cores: 16, gpus: 4 }), leaf('host', 'h1', 8, 8), leaf('host', 'h2', 8, 8));
  assert.deepEqual(freeBlockSizes(socket, 'cores'), [16]);
});

test('fully free children of the cluster root stay separate', () => {
  const root = attach(createClusterRoot(), leaf('host', 'h1', 8, 8), leaf('host', 'h2', 8, 8));
  assert.deepEqual(freeBlockSizes(root, 'cores'), [8, 8]);
});

test('fragmented children pass their blocks through, sorted descending', () => {
  const host = attach(createDeviceNode('host', 'h1', { cores: 16, gpus: 0 }), leaf('vnode', 'v0', 8, 8), leaf('vnode', 'v1', 8, 4));
  const second = attach(createDeviceNode('host', 'h2', { cores: 16, gpus: 0 }), leaf('vnode', 'v0', 8, 2));
  const sw = attach(createDeviceNode('switch', 'sw1', { cores: 64, gpus: 0 }), second, host);
  const root = attach(createClusterRoot(), sw);

  assert.deepEqual(freeBlockSizes(host, 'cores'), [8, 4]);
  assert.deepEqual(freeBlockSizes(root, 'cores'), [8, 4, 2]);
});

test('children without a declared capacity are never merged', () => {
  const host = attach(createDeviceNode('host', 'h1', null), leaf('vnode', 'v0', 8, 8));
  const socket = attach(createDeviceNode('socket', 's0', { cores: 8, gpus: 0 }), host);
  assert.deepEqual(freeBlockSizes(socket, 'cores'), [8]);
  const parent = attach(createDeviceNode('switch', 'sw', null), createDeviceNode('host', 'empty', null), socket);
  assert.deepEqual(freeBlockSizes(parent, 'cores'), [8]);
});

test('gpus are aggregated over the same topology', () => {
  const socket = attach(
    createDeviceNode('socket', 's0', { cores: 16, gpus: 4 }),
    leaf('host', 'h1', 8, 3, 2),
    leaf('host', 'h2', 8, 8, 1)
  );
  assert.deepEqual(freeBlockSizes(socket, 'cores'), [8, 3]);
  assert.deepEqual(freeBlockSizes(socket, 'gpus'), [2, 1]);
});

const capacities: CapacityMap = {
  switch: null,
  host: { cores: 16, gpus: 0 },
  socket: null,
  vnode: { cores: 8, gpus: 0 }
};

test('insertion creates children lazily and reuses visited ones', () => {
  const root = createClusterRoot('work');
  const first = insertDevicePath(root, { switch: null, host: 'cn001', socket: null, vnode: 'cn001[0]' }, capacities, { cores: 8, gpus: 0 });
  insertDevicePath(root, { switch: null, host: 'cn001', socket: null, vnode: 'cn001[1]' }, capacities, { cores: 2, gpus: 0 });

  assert.equal(root.children.size, 1);
  const host = root.children.get('cn001');
  assert.ok(host);
  assert.equal(host.kind, 'host');
  assert.deepEqual(host.capacity, { cores: 16, gpus: 0 });
  assert.deepEqual(host.free, { cores: 0, gpus: 0 });
  assert.equal(host.children.size, 2);
  assert.equal(host.children.get('cn001[0]'), first);
  assert.equal(first.kind, 'vnode');
  assert.deepEqual(first.free, { cores: 8, gpus: 0 });
  assert.deepEqual(freeBlockSizes(root, 'cores'), [8, 2]);
});

test('insertion with every level absent leaves the root untouched', () => {
  const root = createClusterRoot();
  const target = insertDevicePath(root, { switch: null, host: null, socket: null, vnode: null }, capacities, { cores: 4, gpus: 0 });
  assert.equal(target, root);
  assert.equal(root.children.size, 0);
  assert.deepEqual(root.free, { cores: 0, gpus: 0 });
});

export type DeviceKind = 'cluster' | 'switch' | 'host' | 'socket' | 'vnode';

/** Levels below the cluster root, outermost first. */
export const DEVICE_LEVELS = ['switch', 'host', 'socket', 'vnode'] as const satisfies readonly DeviceKind[];
export type DeviceLevel = (typeof DEVICE_LEVELS)[number];

export type ResourcePair = {
  cores: number;
  gpus: number;
};

export type ResourceKind = keyof ResourcePair;

export type CapacityMap = Record<DeviceLevel, ResourcePair | null>;

/** Topology identifiers of one vnode; `null` levels are skipped. */
export type DevicePath = Record<DeviceLevel, string | null>;

export type DeviceNode = {
  kind: DeviceKind;
  name: string;
  capacity: ResourcePair | null;
  /** Only meaningful on the node a path terminates at. */
  free: ResourcePair;
  children: Map<string, DeviceNode>;
};

export function createDeviceNode(kind: DeviceKind, name: string, capacity: ResourcePair | null): DeviceNode {
  return {
    kind,
    name,
    capacity,
    free: { cores: 0, gpus: 0 },
    children: new Map()
  };
}

export function createClusterRoot(name = 'cluster'): DeviceNode {
  return createDeviceNode('cluster', name, null);
}

/**
 * Walks `path` from `root`, creating missing children with the capacity the
 * map declares for their level, and stamps `free` on the last visited node.
 * Returns that node, or `root` itself when every level is absent.
 */
export function insertDevicePath(root: DeviceNode, path: DevicePath, capacities: CapacityMap, free: ResourcePair): DeviceNode {
  let current = root;
  for (const level of DEVICE_LEVELS) {
    const name = path[level];
    if (name === null) {
      continue;
    }
    let child = current.children.get(name);
    if (!child) {
      child = createDeviceNode(level, name, capacities[level]);
      current.children.set(name, child);
    }
    current = child;
  }
  if (current !== root) {
    current.free = { cores: free.cores, gpus: free.gpus };
  }
  return current;
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function finalize(blocks: number[]): number[] {
  return blocks.filter((value) => value !== 0).sort((left, right) => right - left);
}

/**
 * Largest indivisible free blocks under `node` for one resource. Fully free
 * children are merged into one block, except directly under the cluster root
 * where each top-level unit stays separate.
 */
export function freeBlockSizes(node: DeviceNode, resource: ResourceKind): number[] {
  if (node.children.size === 0) {
    return finalize([node.free[resource]]);
  }

  let merged = 0;
  const fragments: number[] = [];
  for (const child of node.children.values()) {
    const blocks = freeBlockSizes(child, resource);
    const capacity = child.capacity?.[resource];
    if (capacity !== undefined && sum(blocks) === capacity && !isClusterRoot(node)) {
      merged += capacity;
    } else {
      fragments.push(...blocks);
    }
  }
  return finalize([merged, ...fragments]);
}

function isClusterRoot(node: DeviceNode): boolean {
  switch (node.kind) {
    case 'cluster':
      return true;
    case 'switch':
    case 'host':
    case 'socket':
    case 'vnode':
      return false;
    default: {
      const exhaustive: never = node.kind;
      return exhaustive;
    }
  }
}

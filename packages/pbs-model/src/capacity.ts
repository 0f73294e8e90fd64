import type { JsonObject } from '@hpcpulse/shared';

import type { CapacityMap, DeviceLevel, ResourcePair } from './deviceTree';
import { readCount, readResource } from './records';

const DENSITY_SECTIONS = ['resources_available', 'resources_default'] as const;

function readDensity(queue: JsonObject, attribute: string): number | null {
  for (const section of DENSITY_SECTIONS) {
    const value = readCount(readResource(queue, section, attribute));
    if (value !== null) {
      return value;
    }
  }
  return null;
}

function levelCapacity(queue: JsonObject, level: DeviceLevel): ResourcePair | null {
  const cores = readDensity(queue, `${level}_ncpus`);
  if (cores === null || cores <= 0) {
    return null;
  }
  return { cores, gpus: readDensity(queue, `${level}_ngpus`) ?? 0 };
}

/**
 * Per-level capacity declared on a queue through the custom resources
 * `<level>_ncpus` / `<level>_ngpus` (level: switch, host, socket, vnode).
 */
export function deriveCapacityMap(queue: JsonObject): CapacityMap {
  return {
    switch: levelCapacity(queue, 'switch'),
    host: levelCapacity(queue, 'host'),
    socket: levelCapacity(queue, 'socket'),
    vnode: levelCapacity(queue, 'vnode')
  };
}

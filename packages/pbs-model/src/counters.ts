import {
  createClusterRoot,
  freeBlockSizes,
  insertDevicePath,
  type CapacityMap,
  type DeviceNode,
  type DevicePath,
  type ResourcePair
} from './deviceTree';

/** One vnode as seen from one scope (a queue it belongs to, or the cluster). */
export type NodeSample = {
  allCores: number;
  assignedCores: number;
  allGpus: number;
  assignedGpus: number;
  offline: boolean;
  /** The vnode belongs to exactly one queue. */
  private: boolean;
  path: DevicePath;
};

export type JobSample = {
  cores: number;
  gpus: number;
  owner: string | null;
};

export type CounterExport = {
  waiting_cores: number;
  waiting_gpus: number;
  using_cores: number;
  using_gpus: number;
  free_cores: number;
  free_gpus: number;
  offline_cores: number;
  offline_gpus: number;
  running_jobs: number;
  waiting_jobs: number;
  user_count: number;
  job_size_avg: number;
  load: number;
};

export type ClusterStatistics = CounterExport & {
  total_cores: number;
  total_gpus: number;
};

export type QueueStatistics = CounterExport & {
  min_cores: number;
  max_cores: number;
  min_gpus: number;
  max_gpus: number;
  free_cores_group: number[];
  free_gpus_group: number[];
};

const EXACT_DIGITS = 100;

/**
 * Rounds to two decimals on the exact binary value: a value stored just
 * below a half goes down, an exact half goes to the even neighbour.
 */
export function round2(value: number): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) {
    return value;
  }
  const [whole = '0', fraction = ''] = Math.abs(value).toFixed(EXACT_DIGITS).split('.');
  const kept = fraction.slice(0, 2);
  const rest = fraction.slice(2);

  let scaled = BigInt(`${whole}${kept}`);
  const first = rest.charAt(0);
  const tail = rest.slice(1);
  const isTie = first === '5' && /^0*$/.test(tail);
  if (first > '5' || (first === '5' && !isTie) || (isTie && scaled % 2n === 1n)) {
    scaled += 1n;
  }
  const rounded = Number(scaled) / 100;
  return value < 0 ? -rounded : rounded;
}

export function computeLoad(usingCores: number, waitingCores: number, freeCores: number): number {
  const denominator = usingCores + freeCores;
  if (denominator === 0) {
    return 0;
  }
  return round2((usingCores + waitingCores) / denominator);
}

export function computeJobSizeAverage(samples: readonly number[]): number {
  if (samples.length === 0) {
    return 0;
  }
  const total = samples.reduce((sum, value) => sum + value, 0);
  return round2(total / samples.length);
}

/**
 * Per-pass accumulator for one scope. Values only grow; a new instance is
 * created for every aggregation pass.
 */
export class ResourceCounters {
  waitingCores = 0;
  waitingGpus = 0;
  usingCores = 0;
  usingGpus = 0;
  freeCores = 0;
  freeGpus = 0;
  offlineCores = 0;
  offlineGpus = 0;
  runningJobs = 0;
  waitingJobs = 0;

  protected readonly users = new Set<string>();
  protected readonly jobSizes: number[] = [];

  /**
   * Records a vnode and returns what is still unassigned on it, or `null`
   * for an offline vnode.
   */
  addVnode(sample: NodeSample): ResourcePair | null {
    if (sample.offline) {
      this.offlineCores += sample.allCores;
      this.offlineGpus += sample.allGpus;
      return null;
    }
    const free = {
      cores: Math.max(0, sample.allCores - sample.assignedCores),
      gpus: Math.max(0, sample.allGpus - sample.assignedGpus)
    };
    this.freeCores += free.cores;
    this.freeGpus += free.gpus;
    return free;
  }

  addRunningJob(job: JobSample): void {
    this.usingCores += job.cores;
    this.usingGpus += job.gpus;
    this.runningJobs += 1;
    if (job.owner) {
      this.users.add(job.owner);
    }
    this.jobSizes.push(job.cores);
  }

  addQueuedJob(job: JobSample): void {
    this.waitingCores += job.cores;
    this.waitingGpus += job.gpus;
    this.waitingJobs += 1;
  }

  get userCount(): number {
    return this.users.size;
  }

  get load(): number {
    return computeLoad(this.usingCores, this.waitingCores, this.freeCores);
  }

  get jobSizeAverage(): number {
    return computeJobSizeAverage(this.jobSizes);
  }

  export(): CounterExport {
    return {
      waiting_cores: this.waitingCores,
      waiting_gpus: this.waitingGpus,
      using_cores: this.usingCores,
      using_gpus: this.usingGpus,
      free_cores: this.freeCores,
      free_gpus: this.freeGpus,
      offline_cores: this.offlineCores,
      offline_gpus: this.offlineGpus,
      running_jobs: this.runningJobs,
      waiting_jobs: this.waitingJobs,
      user_count: this.userCount,
      job_size_avg: this.jobSizeAverage,
      load: this.load
    };
  }
}

export class ClusterCounters extends ResourceCounters {
  totalCores = 0;
  totalGpus = 0;

  override addVnode(sample: NodeSample): ResourcePair | null {
    this.totalCores += sample.allCores;
    this.totalGpus += sample.allGpus;
    return super.addVnode(sample);
  }

  override export(): ClusterStatistics {
    return {
      ...super.export(),
      total_cores: this.totalCores,
      total_gpus: this.totalGpus
    };
  }
}

export class QueueCounters extends ResourceCounters {
  readonly name: string;
  readonly capacities: CapacityMap;
  readonly root: DeviceNode;

  minCores = 0;
  maxCores = 0;
  minGpus = 0;
  maxGpus = 0;

  constructor(name: string, capacities: CapacityMap) {
    super();
    this.name = name;
    this.capacities = capacities;
    this.root = createClusterRoot(name);
  }

  /**
   * Offline vnodes only contribute what running jobs still hold on them to
   * the effective capacity. Online vnodes with free cores enter the tree.
   */
  override addVnode(sample: NodeSample): ResourcePair | null {
    const free = super.addVnode(sample);
    const cores = sample.offline ? sample.assignedCores : sample.allCores;
    const gpus = sample.offline ? sample.assignedGpus : sample.allGpus;

    this.maxCores += cores;
    this.maxGpus += gpus;
    if (sample.private) {
      this.minCores += cores;
      this.minGpus += gpus;
    }

    if (free !== null && free.cores > 0) {
      insertDevicePath(this.root, sample.path, this.capacities, free);
    }
    return free;
  }

  freeCoreGroups(): number[] {
    return freeBlockSizes(this.root, 'cores');
  }

  freeGpuGroups(): number[] {
    return freeBlockSizes(this.root, 'gpus');
  }

  override export(): QueueStatistics {
    return {
      ...super.export(),
      min_cores: this.minCores,
      max_cores: this.maxCores,
      min_gpus: this.minGpus,
      max_gpus: this.maxGpus,
      free_cores_group: this.freeCoreGroups(),
      free_gpus_group: this.freeGpuGroups()
    };
  }
}

import pino, { type Logger } from 'pino';
import type { JsonObject } from '@hpcpulse/shared';

import { deriveCapacityMap } from './capacity';
import { ClusterCounters, QueueCounters, type JobSample, type NodeSample } from './counters';
import type { DevicePath } from './deviceTree';
import type { PbsDocument } from './document';
import { TopologyError } from './errors';
import { nowInSeconds } from './freshness';
import { sanitizeKey } from './keys';
import { readCount, readResource, readSection, readString, type SchedulerSnapshot } from './records';

export type AggregationLogger = Pick<Logger, 'debug' | 'warn'>;

export type BuildDocumentOptions = {
  logger?: AggregationLogger;
  now?: Date;
};

export type BuildDocumentResult = {
  document: PbsDocument;
  issues: TopologyError[];
  queues: Map<string, QueueCounters>;
  cluster: ClusterCounters;
};

const OFFLINE_STATE_MARKERS = ['offline', 'down', 'unknown', 'unresolvable', 'stale'];
const MEMBERSHIP_SEPARATOR = /[,\s]+/;

export type JobState = 'running' | 'queued' | 'other';

export function classifyJobState(value: string | null): JobState {
  switch (value) {
    case 'R':
      return 'running';
    case 'Q':
      return 'queued';
    default:
      return 'other';
  }
}

/**
 * Queue membership of a vnode: the `queue` attribute, else the
 * `resources_available.Qlist` list. `null` when neither is present.
 */
export function resolveNodeMembership(node: JsonObject): string[] | null {
  const tag = readString(node.queue);
  if (tag) {
    return [tag];
  }
  const list = readString(readResource(node, 'resources_available', 'Qlist'));
  if (!list) {
    return null;
  }
  const members = Array.from(new Set(list.split(MEMBERSHIP_SEPARATOR).filter((entry) => entry.length > 0)));
  return members.length > 0 ? members : null;
}

export function isNodeOffline(node: JsonObject): boolean {
  const state = readString(node.state)?.toLowerCase();
  if (!state) {
    return false;
  }
  return OFFLINE_STATE_MARKERS.some((marker) => state.includes(marker));
}

export function resolveDevicePath(nodeId: string, node: JsonObject): DevicePath {
  const available = readSection(node, 'resources_available') ?? {};
  return {
    switch: readString(available.switch),
    host: readString(available.host) ?? readString(node.Mom),
    socket: readString(available.socket),
    vnode: readString(available.vnode) ?? nodeId
  };
}

function toNodeSample(nodeId: string, node: JsonObject, isPrivate: boolean): NodeSample {
  return {
    allCores: readCount(readResource(node, 'resources_available', 'ncpus')) ?? 0,
    assignedCores: readCount(readResource(node, 'resources_assigned', 'ncpus')) ?? 0,
    allGpus: readCount(readResource(node, 'resources_available', 'ngpus')) ?? 0,
    assignedGpus: readCount(readResource(node, 'resources_assigned', 'ngpus')) ?? 0,
    offline: isNodeOffline(node),
    private: isPrivate,
    path: resolveDevicePath(nodeId, node)
  };
}

export function resolveJobOwner(job: JsonObject): string | null {
  const euser = readString(job.euser);
  if (euser) {
    return euser;
  }
  const owner = readString(job.Job_Owner);
  if (!owner) {
    return null;
  }
  const [user] = owner.split('@');
  return user && user.length > 0 ? user : null;
}

function toJobSample(job: JsonObject): JobSample {
  return {
    cores: readCount(readResource(job, 'Resource_List', 'ncpus')) ?? 0,
    gpus: readCount(readResource(job, 'Resource_List', 'ngpus')) ?? 0,
    owner: resolveJobOwner(job)
  };
}

function keyRecords(
  section: 'nodes' | 'Jobs',
  records: Record<string, JsonObject>,
  logger: AggregationLogger
): Record<string, JsonObject> {
  const keyed: Record<string, JsonObject> = {};
  for (const [id, record] of Object.entries(records)) {
    const key = sanitizeKey(id);
    const existing = keyed[key];
    if (existing) {
      logger.warn({ section, key, id, previousId: existing.id }, 'Sanitized key collision, keeping the later record');
    }
    keyed[key] = { ...record, id };
  }
  return keyed;
}

const silentLogger: AggregationLogger = pino({ level: 'silent' });

/**
 * Builds the published document for one pass: queue and cluster counters,
 * per-queue resource trees, and sanitized node/job sections. Records that
 * cannot be attributed to a declared queue are skipped and reported in
 * `issues`; they never fail the pass.
 */
export function buildDocument(snapshot: SchedulerSnapshot, options: BuildDocumentOptions = {}): BuildDocumentResult {
  const logger = options.logger ?? silentLogger;
  const issues: TopologyError[] = [];
  const cluster = new ClusterCounters();
  const queues = new Map<string, QueueCounters>();

  for (const [name, queue] of Object.entries(snapshot.queues.Queue)) {
    queues.set(name, new QueueCounters(name, deriveCapacityMap(queue)));
  }

  for (const [nodeId, node] of Object.entries(snapshot.nodes.nodes)) {
    const membership = resolveNodeMembership(node);
    if (!membership) {
      logger.debug({ node: nodeId }, 'Vnode has no queue membership, skipping');
      continue;
    }

    const members: QueueCounters[] = [];
    for (const queueName of membership) {
      const counters = queues.get(queueName);
      if (counters) {
        members.push(counters);
        continue;
      }
      const issue = new TopologyError('node', nodeId, queueName);
      issues.push(issue);
      logger.warn({ node: nodeId, queue: queueName }, issue.message);
    }
    if (members.length === 0) {
      logger.warn({ node: nodeId, membership }, 'Vnode belongs to no declared queue, skipping');
      continue;
    }

    const sample = toNodeSample(nodeId, node, membership.length === 1);
    for (const counters of members) {
      counters.addVnode(sample);
    }
    cluster.addVnode(sample);
  }

  for (const [jobId, job] of Object.entries(snapshot.jobs.Jobs)) {
    const queueName = readString(job.queue) ?? '<none>';
    const counters = queues.get(queueName);
    if (!counters) {
      const issue = new TopologyError('job', jobId, queueName);
      issues.push(issue);
      logger.warn({ job: jobId, queue: queueName }, issue.message);
      continue;
    }

    const state = readString(job.job_state);
    const sample = toJobSample(job);
    switch (classifyJobState(state)) {
      case 'running':
        counters.addRunningJob(sample);
        cluster.addRunningJob(sample);
        break;
      case 'queued':
        counters.addQueuedJob(sample);
        cluster.addQueuedJob(sample);
        break;
      case 'other':
        logger.debug({ job: jobId, state }, 'Job state is not counted');
        break;
    }
  }

  const queueSection: Record<string, JsonObject> = {};
  for (const [name, queue] of Object.entries(snapshot.queues.Queue)) {
    const counters = queues.get(name);
    queueSection[name] = counters ? { ...queue, statistics: counters.export() } : queue;
  }

  const clusterStatistics = cluster.export();
  const serverSection: Record<string, JsonObject> = {};
  for (const [name, server] of Object.entries(snapshot.server.Server)) {
    serverSection[name] = { ...server, statistics: clusterStatistics };
  }

  const document: PbsDocument = {
    timestamp: nowInSeconds(options.now),
    pbs_version: snapshot.server.pbs_version ?? null,
    pbs_server: snapshot.server.pbs_server,
    Server: serverSection,
    Queue: queueSection,
    nodes: keyRecords('nodes', snapshot.nodes.nodes, logger),
    Jobs: keyRecords('Jobs', snapshot.jobs.Jobs, logger)
  };

  return { document, issues, queues, cluster };
}

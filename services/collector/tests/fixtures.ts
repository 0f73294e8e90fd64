import type { DocumentStore } from '@hpcpulse/document-store';
import type { JsonValue } from '@hpcpulse/shared';
import pino from 'pino';

import { createCollectorState, type CollectorContext } from '../src/collector';
import type { CollectorConfig } from '../src/config';
import { createMetrics } from '../src/metrics';
import type { CommandInvoker, CommandResult } from '../src/scheduler/commandRunner';
import { createSchedulerSource, type SchedulerSource } from '../src/scheduler/source';

export const silentLogger = pino({ level: 'silent' });

export const serverOutput = {
  timestamp: 1767225000,
  pbs_version: '2022.1.1',
  pbs_server: 'pbs01',
  Server: { pbs01: { server_state: 'Active' } }
};

export const queueOutput = {
  Queue: {
    work: { queue_type: 'Execution', resources_available: { host_ncpus: 16 } }
  }
};

function node(host: string, assigned: number) {
  return {
    Mom: host,
    state: assigned > 0 ? 'job-busy' : 'free',
    queue: 'work',
    resources_available: { host, vnode: host, ncpus: 16, ngpus: 0 },
    resources_assigned: { ncpus: assigned, ngpus: 0 }
  };
}

export const nodeOutput = {
  nodes: { n1: node('n1', 8), n2: node('n2', 0) }
};

export const jobOutput = {
  Jobs: {
    '1.pbs01': { job_state: 'R', queue: 'work', euser: 'alice', Resource_List: { ncpus: 8 } },
    '2.pbs01': { job_state: 'Q', queue: 'work', euser: 'bob', Resource_List: { ncpus: 8 } }
  }
};

/** Pretty-printed job output with one line PBS would emit unescaped. */
export function malformedJobOutput(): string {
  const lines = JSON.stringify(jobOutput, null, 2).split('\n');
  lines.splice(2, 0, '    "junk": "a"b",');
  return lines.join('\n');
}

export type InvokerCall = {
  command: string;
  args: string[];
};

/** Answers each scheduler binary from `outputs`, keyed by `<binary> <first arg>`. */
export function createFakeInvoker(overrides: Record<string, Partial<CommandResult>> = {}) {
  const calls: InvokerCall[] = [];
  const outputs: Record<string, string> = {
    'qstat -Bf': JSON.stringify(serverOutput),
    'qstat -Qf': JSON.stringify(queueOutput),
    'pbsnodes -avj': JSON.stringify(nodeOutput),
    'qstat -f': JSON.stringify(jobOutput)
  };

  const invoker: CommandInvoker = async (command, args) => {
    calls.push({ command, args });
    const binary = command.split('/').pop() ?? command;
    const key = `${binary} ${args[0] ?? ''}`;
    return {
      exitCode: 0,
      stdout: outputs[key] ?? '',
      stderr: '',
      timedOut: false,
      ...overrides[key]
    };
  };
  return { invoker, calls };
}

export function createFakeSource(overrides?: Record<string, Partial<CommandResult>>): SchedulerSource {
  return createSchedulerSource({
    binDir: '/opt/pbs/bin',
    timeoutMs: 1_000,
    invoker: createFakeInvoker(overrides).invoker
  });
}

/** Store that keeps what it was given and can be told to fail. */
export class RecordingStore implements DocumentStore {
  readonly documents = new Map<string, JsonValue>();
  closed = false;

  constructor(
    readonly name: string,
    private readonly failure: string | null = null
  ) {}

  async setDocument(key: string, document: JsonValue): Promise<void> {
    if (this.failure) {
      throw new Error(this.failure);
    }
    this.documents.set(key, document);
  }

  async getPath(): Promise<JsonValue[] | null> {
    return null;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function createContext(overrides: Partial<CollectorContext> = {}): CollectorContext {
  return {
    site: 'test',
    source: createFakeSource(),
    stores: [new RecordingStore('primary')],
    logger: silentLogger,
    metrics: createMetrics(),
    state: createCollectorState(),
    now: () => new Date('2026-01-01T00:00:00Z'),
    ...overrides
  };
}

export function createTestConfig(overrides: Partial<CollectorConfig> = {}): CollectorConfig {
  return {
    site: 'test',
    intervalSeconds: 30,
    pbsBinDir: '/opt/pbs/bin',
    commandTimeoutMs: 1_000,
    redisUrls: ['inline'],
    logLevel: 'silent',
    appPath: '/etc/app.d',
    status: { enabled: false, host: '127.0.0.1', port: 0 },
    ...overrides
  };
}

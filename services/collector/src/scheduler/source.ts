import path from 'node:path';

import { IngestionError, type RawSchedulerOutput, type SchedulerQuery } from '@hpcpulse/pbs-model';

import { spawnCommand, type CommandInvoker } from './commandRunner';

export type SchedulerCommand = {
  binary: string;
  args: string[];
};

export const SCHEDULER_COMMANDS: Record<SchedulerQuery, SchedulerCommand> = {
  server: { binary: 'qstat', args: ['-Bf', '-F', 'json'] },
  queues: { binary: 'qstat', args: ['-Qf', '-F', 'json'] },
  nodes: { binary: 'pbsnodes', args: ['-avj', '-F', 'json'] },
  jobs: { binary: 'qstat', args: ['-f', '-F', 'json'] }
};

export type SchedulerSourceOptions = {
  binDir: string;
  timeoutMs: number;
  invoker?: CommandInvoker;
};

export interface SchedulerSource {
  /** Runs the four introspection commands; rejects unless all of them succeed. */
  fetchAll(): Promise<RawSchedulerOutput>;
}

export function createSchedulerSource(options: SchedulerSourceOptions): SchedulerSource {
  const invoke = options.invoker ?? spawnCommand;

  async function fetchQuery(query: SchedulerQuery): Promise<string> {
    const { binary, args } = SCHEDULER_COMMANDS[query];
    const command = path.join(options.binDir, binary);
    const result = await invoke(command, args, { timeoutMs: options.timeoutMs });

    if (result.timedOut) {
      throw new IngestionError(query, `${binary} timed out after ${options.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || 'no output on stderr';
      throw new IngestionError(query, `${binary} ${args.join(' ')} exited with ${result.exitCode ?? 'no status'}: ${detail}`);
    }
    return result.stdout;
  }

  return {
    async fetchAll(): Promise<RawSchedulerOutput> {
      const [server, queues, nodes, jobs] = await Promise.all([
        fetchQuery('server'),
        fetchQuery('queues'),
        fetchQuery('nodes'),
        fetchQuery('jobs')
      ]);
      return { server, queues, nodes, jobs };
    }
  };
}

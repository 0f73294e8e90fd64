import { Command } from 'commander';
import { APP_REGISTRY_KEY } from '@hpcpulse/pbs-model';

import { loadAppRegistry } from './appRegistry';
import { collectDocument, runCollectorLoop, runPass } from './collector';
import { loadCollectorConfig, type CollectorConfig } from './config';
import { publishDocument } from './publisher';
import { closeRuntime, createRuntime, type CollectorRuntime } from './runtime';
import { createStatusServer } from './statusServer';

/** Readiness tolerates this many missed intervals before `/readyz` reports 503. */
const READY_INTERVALS = 4;

export type CliDependencies = {
  loadConfig?: () => CollectorConfig;
  runtimeFactory?: (config: CollectorConfig) => CollectorRuntime;
  write?: (text: string) => void;
  /** Signals that stop `run`; defaults to SIGINT and SIGTERM. */
  stopSignals?: NodeJS.Signals[];
};

function printJson(write: (text: string) => void, payload: unknown): void {
  write(`${JSON.stringify(payload, null, 2)}\n`);
}

async function withRuntime<T>(
  deps: Required<Pick<CliDependencies, 'loadConfig' | 'runtimeFactory'>>,
  handler: (runtime: CollectorRuntime) => Promise<T>
): Promise<T> {
  const runtime = deps.runtimeFactory(deps.loadConfig());
  try {
    return await handler(runtime);
  } finally {
    await closeRuntime(runtime);
  }
}

async function handleRun(runtime: CollectorRuntime, stopSignals: NodeJS.Signals[]): Promise<void> {
  const { config, logger } = runtime;
  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received shutdown signal');
    controller.abort();
  };
  for (const signal of stopSignals) {
    process.once(signal, stop);
  }

  const statusServer = config.status.enabled
    ? createStatusServer({
        logLevel: config.logLevel,
        metrics: runtime.metrics,
        state: runtime.state,
        maxStalenessMs: config.intervalSeconds * 1000 * READY_INTERVALS
      })
    : null;

  try {
    if (statusServer) {
      await statusServer.listen({ host: config.status.host, port: config.status.port });
    }
    await runCollectorLoop(runtime, { intervalMs: config.intervalSeconds * 1000, signal: controller.signal });
  } finally {
    for (const signal of stopSignals) {
      process.removeListener(signal, stop);
    }
    if (statusServer) {
      await statusServer.close();
    }
  }
}

export function createInterface(deps: CliDependencies = {}): Command {
  const loadConfig = deps.loadConfig ?? (() => loadCollectorConfig());
  const runtimeFactory =
    deps.runtimeFactory ?? ((config: CollectorConfig) => createRuntime(config, { collectDefaultMetrics: true }));
  const write = deps.write ?? ((text: string) => process.stdout.write(text));
  const stopSignals = deps.stopSignals ?? ['SIGINT', 'SIGTERM'];
  const runtimeDeps = { loadConfig, runtimeFactory };

  const program = new Command();
  program
    .name('hpc-pulse-collector')
    .description('Samples a PBS scheduler and publishes the aggregated site document');

  program
    .command('run')
    .description('Run aggregation passes until interrupted')
    .action(async () => {
      await withRuntime(runtimeDeps, (runtime) => handleRun(runtime, stopSignals));
    });

  program
    .command('once')
    .description('Run a single aggregation pass and publish it')
    .action(async () => {
      const summary = await withRuntime(runtimeDeps, (runtime) => runPass(runtime));
      printJson(write, summary);
    });

  program
    .command('dump')
    .description('Aggregate one snapshot and print the document without publishing it')
    .action(async () => {
      const { document } = await withRuntime(runtimeDeps, (runtime) => collectDocument(runtime));
      printJson(write, document);
    });

  program
    .command('load-apps')
    .description('Publish the application registry read from TOML descriptors')
    .option('--app-path <dir>', 'Directory holding *.toml application descriptors')
    .option('--dry-run', 'Print the registry instead of publishing it', false)
    .action(async (cmdOptions: { appPath?: string; dryRun?: boolean }) => {
      await withRuntime(runtimeDeps, async (runtime) => {
        const directory = cmdOptions.appPath ?? runtime.config.appPath;
        const registry = await loadAppRegistry(directory);
        runtime.logger.info({ directory, apps: Object.keys(registry).length }, 'Loaded application registry');
        if (cmdOptions.dryRun) {
          printJson(write, registry);
          return;
        }
        const result = await publishDocument(runtime.stores, APP_REGISTRY_KEY, registry, { logger: runtime.logger });
        printJson(write, { key: APP_REGISTRY_KEY, apps: Object.keys(registry).length, ...result });
      });
    });

  return program;
}

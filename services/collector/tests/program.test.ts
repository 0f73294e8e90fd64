import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import type { CollectorConfig } from '../src/config';
import { createInterface } from '../src/program';
import { createRuntime } from '../src/runtime';
import { createFakeSource, createTestConfig, RecordingStore, silentLogger } from './fixtures';

const setup = (config: CollectorConfig = createTestConfig()) => {
  const store = new RecordingStore('primary');
  const output: string[] = [];
  const program = createInterface({
    loadConfig: () => config,
    runtimeFactory: (loaded) => createRuntime(loaded, { logger: silentLogger, stores: [store], source: createFakeSource() }),
    write: (text) => output.push(text)
  });
  return { program, store, output };
};

test('once publishes and prints the pass summary', async () => {
  const { program, store, output } = setup();

  await program.parseAsync(['node', 'hpc-pulse-collector', 'once']);

  assert.ok(store.documents.has('pbs_test'));
  assert.ok(store.closed);
  const summary = JSON.parse(output.join(''));
  assert.equal(summary.key, 'pbs_test');
  assert.deepEqual(summary.published, ['primary']);
});

test('dump prints the document without publishing it', async () => {
  const { program, store, output } = setup();

  await program.parseAsync(['node', 'hpc-pulse-collector', 'dump']);

  assert.equal(store.documents.size, 0);
  const document = JSON.parse(output.join(''));
  assert.equal(document.pbs_server, 'pbs01');
  assert.deepEqual(Object.keys(document.nodes), ['n1', 'n2']);
});

test('load-apps publishes the registry under the app key', async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'pbs-apps-'));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  await writeFile(path.join(dir, 'namd.toml'), 'Name = "NAMD"\nMaxCores = 64\n', 'utf8');

  const { program, store } = setup(createTestConfig({ appPath: dir }));
  await program.parseAsync(['node', 'hpc-pulse-collector', 'load-apps']);

  assert.deepEqual(store.documents.get('app'), {
    namd: {
      Name: 'NAMD',
      DefaultMinCores: 0,
      MaxCores: 64,
      DefaultVersion: null,
      Versions: [],
      MPI: null,
      OpenMP: 0,
      MaxGPU: 0,
      DefaultGPU: 0,
      DefaultCoreWithGPU: -1
    }
  });
});

test('load-apps --dry-run only prints the registry', async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'pbs-apps-'));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  await writeFile(path.join(dir, 'orca.toml'), 'Name = "ORCA"\n', 'utf8');

  const { program, store, output } = setup();
  await program.parseAsync(['node', 'hpc-pulse-collector', 'load-apps', '--app-path', dir, '--dry-run']);

  assert.equal(store.documents.size, 0);
  assert.deepEqual(Object.keys(JSON.parse(output.join(''))), ['orca']);
});

test('load-apps leaves the published registry alone when the directory has no descriptors', async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'pbs-apps-'));
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const { program, store } = setup(createTestConfig({ appPath: dir }));
  await store.setDocument('app', { namd: { Name: 'NAMD' } });

  await assert.rejects(program.parseAsync(['node', 'hpc-pulse-collector', 'load-apps']), {
    name: 'AppRegistryError',
    message: `${dir}: no *.toml application descriptors found`
  });
  assert.deepEqual(store.documents.get('app'), { namd: { Name: 'NAMD' } });
});

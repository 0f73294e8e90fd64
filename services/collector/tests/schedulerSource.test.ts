import assert from 'node:assert/strict';
import { test } from 'node:test';

import { IngestionError } from '@hpcpulse/pbs-model';

import { createSchedulerSource } from '../src/scheduler/source';
import { createFakeInvoker, serverOutput } from './fixtures';

test('runs the four introspection commands from the configured directory', async () => {
  const { invoker, calls } = createFakeInvoker();
  const source = createSchedulerSource({ binDir: '/srv/pbs/bin', timeoutMs: 500, invoker });

  const raw = await source.fetchAll();

  assert.deepEqual(
    calls.map((call) => [call.command, ...call.args].join(' ')),
    [
      '/srv/pbs/bin/qstat -Bf -F json',
      '/srv/pbs/bin/qstat -Qf -F json',
      '/srv/pbs/bin/pbsnodes -avj -F json',
      '/srv/pbs/bin/qstat -f -F json'
    ]
  );
  assert.equal(raw.server, JSON.stringify(serverOutput));
});

test('a non-zero exit fails the whole fetch', async () => {
  const { invoker } = createFakeInvoker({
    'pbsnodes -avj': { exitCode: 2, stdout: '', stderr: 'cannot connect to server\n' }
  });
  const source = createSchedulerSource({ binDir: '/opt/pbs/bin', timeoutMs: 500, invoker });

  await assert.rejects(source.fetchAll(), (error: unknown) => {
    assert.ok(error instanceof IngestionError);
    assert.equal(error.source, 'nodes');
    assert.equal(error.message, 'nodes: pbsnodes -avj -F json exited with 2: cannot connect to server');
    return true;
  });
});

test('a timed out command is reported as such', async () => {
  const { invoker } = createFakeInvoker({ 'qstat -f': { exitCode: null, timedOut: true } });
  const source = createSchedulerSource({ binDir: '/opt/pbs/bin', timeoutMs: 500, invoker });

  await assert.rejects(source.fetchAll(), { name: 'IngestionError', message: 'jobs: qstat timed out after 500ms' });
});

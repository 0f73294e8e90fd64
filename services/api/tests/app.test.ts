import assert from 'node:assert/strict';
import { test } from 'node:test';

import { createInlineDocumentStore, type DocumentStore } from '@hpcpulse/document-store';

import { createApp } from '../src/app';
import type { ApiConfig } from '../src/config';

const now = new Date('2026-01-01T00:01:00Z');

const authorization = `Basic ${Buffer.from('pulse:test-secret').toString('base64')}`;

const alphaDocument = {
  timestamp: 1767225600,
  pbs_version: '2022.1.1',
  pbs_server: 'pbs01',
  Server: { pbs01: { server_state: 'Active', statistics: { load: 0.5 } } },
  Queue: { work: { queue_type: 'Execution' }, debug: { queue_type: 'Execution' } },
  nodes: {
    cn001_0: { id: 'cn001[0]', Mom: 'cn001', state: 'free' },
    cn001_1: { id: 'cn001[1]', Mom: 'cn001', state: 'job-busy' },
    cn002: { id: 'cn002', Mom: 'cn002', state: 'offline' }
  },
  Jobs: {
    '1_pbs01': { id: '1.pbs01', euser: 'alice', queue: 'work', job_state: 'R' },
    '2_pbs01': { id: '2.pbs01', euser: 'bob', queue: 'debug', job_state: 'Q' }
  }
};

const makeConfig = (sites: string[]): ApiConfig => ({
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
  redisUrl: 'inline',
  sites,
  user: 'pulse',
  password: 'test-secret',
  maxAgeSeconds: 120
});

const makeApp = async (sites: string[] = ['alpha', 'beta'], store: DocumentStore = createInlineDocumentStore()) => {
  await store.setDocument('pbs_alpha', alphaDocument);
  await store.setDocument('pbs_beta', { ...alphaDocument, timestamp: 1767225000 });
  await store.setDocument('app', {
    namd: { Name: 'NAMD', MaxCores: 64 },
    orca: { Name: 'ORCA', MaxCores: 16 }
  });
  const { app } = await createApp(makeConfig(sites), { store, now: () => now });
  return app;
};

const get = (url: string) => ({ method: 'GET' as const, url, headers: { authorization } });

test('health endpoints are public, everything else needs credentials', async (t) => {
  const app = await makeApp();
  t.after(async () => {
    await app.close();
  });

  const health = await app.inject({ method: 'GET', url: '/healthz' });
  assert.equal(health.statusCode, 200);
  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 200);

  const anonymous = await app.inject({ method: 'GET', url: '/pbs' });
  assert.equal(anonymous.statusCode, 401);
  assert.equal(anonymous.headers['www-authenticate'], 'Basic realm="hpc-pulse"');
  assert.deepEqual(anonymous.json(), { result: false, msg: 'missing credentials' });

  const wrong = await app.inject({
    method: 'GET',
    url: '/pbs',
    headers: { authorization: `Basic ${Buffer.from('pulse:nope').toString('base64')}` }
  });
  assert.equal(wrong.statusCode, 401);
  assert.deepEqual(wrong.json(), { result: false, msg: 'incorrect user or password' });

  const sites = await app.inject(get('/pbs'));
  assert.deepEqual(sites.json(), { result: true, site: ['alpha', 'beta'] });
});

test('serves whole documents only while they are fresh', async (t) => {
  const app = await makeApp(['alpha', 'beta', 'gamma']);
  t.after(async () => {
    await app.close();
  });

  const fresh = await app.inject(get('/pbs/alpha'));
  assert.equal(fresh.statusCode, 200);
  assert.deepEqual(fresh.json(), { result: true, data: [alphaDocument] });

  const stale = await app.inject(get('/pbs/beta'));
  assert.equal(stale.statusCode, 200);
  assert.deepEqual(stale.json(), { result: false, msg: 'pbs info too old' });

  const unpublished = await app.inject(get('/pbs/gamma'));
  assert.deepEqual(unpublished.json(), { result: false, msg: 'invalid site gamma' });

  const unknown = await app.inject(get('/pbs/delta'));
  assert.equal(unknown.statusCode, 404);
  assert.deepEqual(unknown.json(), { result: false, msg: 'invalid site delta' });
});

test('summarizes each document section', async (t) => {
  const app = await makeApp();
  t.after(async () => {
    await app.close();
  });

  assert.deepEqual((await app.inject(get('/pbs/alpha/Jobs'))).json(), {
    result: true,
    count: 2,
    data: ['1.pbs01', '2.pbs01']
  });
  assert.deepEqual((await app.inject(get('/pbs/alpha/nodes'))).json(), {
    result: true,
    count: 3,
    data: ['cn001', 'cn002']
  });
  assert.deepEqual((await app.inject(get('/pbs/alpha/Queue'))).json(), {
    result: true,
    count: 2,
    data: ['work', 'debug']
  });
  assert.deepEqual((await app.inject(get('/pbs/alpha/Server'))).json(), {
    result: true,
    data: { server_state: 'Active', statistics: { load: 0.5 } }
  });

  const invalid = await app.inject(get('/pbs/alpha/Bogus'));
  assert.equal(invalid.statusCode, 400);
  assert.deepEqual(invalid.json(), { result: false, msg: 'invalid request, subject: invalid subject Bogus' });
});

test('resolves detail queries by original identifier and host', async (t) => {
  const app = await makeApp();
  t.after(async () => {
    await app.close();
  });

  const job = await app.inject(get('/pbs/alpha/Jobs/1.pbs01'));
  assert.deepEqual(job.json(), { result: true, data: [alphaDocument.Jobs['1_pbs01']] });

  const projected = await app.inject(get('/pbs/alpha/Jobs/1.pbs01?item=euser&item=queue'));
  assert.deepEqual(projected.json(), { result: true, data: [{ euser: 'alice', queue: 'work' }] });

  const host = await app.inject(get('/pbs/alpha/nodes/cn001?item=id'));
  assert.deepEqual(host.json(), { result: true, data: [{ id: 'cn001[0]' }, { id: 'cn001[1]' }] });

  const queues = await app.inject(get('/pbs/alpha/Queue/*'));
  assert.deepEqual(queues.json(), {
    result: true,
    data: [{ queue_type: 'Execution' }, { queue_type: 'Execution' }]
  });

  const missing = await app.inject(get('/pbs/alpha/Queue/gpu'));
  assert.deepEqual(missing.json(), { result: true, data: [] });

  const invalid = await app.inject(get('/pbs/alpha/Queue/a%20b'));
  assert.equal(invalid.statusCode, 400);
  assert.deepEqual(invalid.json(), { result: false, msg: 'invalid name a b' });
});

test('lists the jobs of a user across every site', async (t) => {
  const app = await makeApp(['alpha']);
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject(get('/users/alice/jobs'));
  assert.deepEqual(response.json(), { result: true, data: { jobs: ['1.pbs01'] } });

  const staleApp = await makeApp(['alpha', 'beta']);
  t.after(async () => {
    await staleApp.close();
  });
  const stale = await staleApp.inject(get('/users/alice/jobs'));
  assert.deepEqual(stale.json(), { result: false, msg: 'pbs info too old' });
});

test('serves the application registry', async (t) => {
  const app = await makeApp();
  t.after(async () => {
    await app.close();
  });

  assert.deepEqual((await app.inject(get('/app'))).json(), { result: true, data: ['NAMD', 'ORCA'] });
  assert.deepEqual((await app.inject(get('/app/namd'))).json(), {
    result: true,
    data: [{ Name: 'NAMD', MaxCores: 64 }]
  });
});

test('store failures are reported as backend failures', async (t) => {
  const broken: DocumentStore = {
    name: 'broken',
    async setDocument() {},
    async getPath() {
      throw new Error('connection lost');
    },
    async close() {}
  };
  const { app } = await createApp(makeConfig(['alpha']), { store: broken, now: () => now });
  t.after(async () => {
    await app.close();
  });

  const response = await app.inject(get('/pbs/alpha'));
  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), { result: false, msg: 'backend failure, connection lost' });

  const ready = await app.inject({ method: 'GET', url: '/readyz' });
  assert.equal(ready.statusCode, 503);
});

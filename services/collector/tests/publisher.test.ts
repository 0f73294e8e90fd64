import assert from 'node:assert/strict';
import { test } from 'node:test';

import { PublicationError } from '@hpcpulse/pbs-model';

import { publishDocument } from '../src/publisher';
import { RecordingStore, silentLogger } from './fixtures';

const document = { timestamp: 1767225600, Queue: {} };

test('writes the document to every destination', async () => {
  const primary = new RecordingStore('primary');
  const replica = new RecordingStore('replica');

  const result = await publishDocument([primary, replica], 'pbs_test', document, { logger: silentLogger });

  assert.deepEqual(result, { published: ['primary', 'replica'], failures: [] });
  assert.deepEqual(primary.documents.get('pbs_test'), document);
  assert.deepEqual(replica.documents.get('pbs_test'), document);
});

test('a failing secondary is reported without failing the publication', async () => {
  const primary = new RecordingStore('primary');
  const replica = new RecordingStore('replica', 'connection refused');
  const failed: string[] = [];

  const result = await publishDocument([primary, replica], 'pbs_test', document, {
    logger: silentLogger,
    onFailure: (failure) => failed.push(failure.destination)
  });

  assert.deepEqual(result, {
    published: ['primary'],
    failures: [{ destination: 'replica', message: 'connection refused' }]
  });
  assert.deepEqual(failed, ['replica']);
});

test('a failing primary rejects after the other destinations were written', async () => {
  const primary = new RecordingStore('primary', 'READONLY');
  const replica = new RecordingStore('replica');

  await assert.rejects(publishDocument([primary, replica], 'pbs_test', document, { logger: silentLogger }), (error: unknown) => {
    assert.ok(error instanceof PublicationError);
    assert.equal(error.message, 'Primary destination primary rejected pbs_test');
    assert.deepEqual(error.failures, [{ destination: 'primary', message: 'READONLY' }]);
    return true;
  });
  assert.deepEqual(replica.documents.get('pbs_test'), document);
});

test('publishing without destinations fails', async () => {
  await assert.rejects(publishDocument([], 'pbs_test', document, { logger: silentLogger }), {
    name: 'PublicationError',
    message: 'No destination configured for pbs_test'
  });
});

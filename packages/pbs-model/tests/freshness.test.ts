import assert from 'node:assert/strict';
import { test } from 'node:test';

import { StaleDataError } from '../src/errors';
import { assertFresh, isFresh, nowInSeconds } from '../src/freshness';

const now = new Date(1_000_000_000);

test('accepts documents up to the threshold', () => {
  assert.equal(nowInSeconds(now), 1_000_000);
  assert.equal(assertFresh(999_880, now), 120);
  assert.equal(isFresh(1_000_000, now), true);
});

test('rejects documents older than the threshold', () => {
  assert.throws(
    () => assertFresh(999_879, now),
    (error: unknown) => error instanceof StaleDataError && error.ageSeconds === 121
  );
  assert.equal(isFresh(999_879, now), false);
  assert.equal(isFresh(999_950, now, 30), false);
});

test('treats a missing timestamp as stale', () => {
  assert.throws(() => assertFresh(undefined, now), StaleDataError);
  assert.equal(isFresh('1000000', now), false);
});

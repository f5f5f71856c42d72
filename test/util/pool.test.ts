import { test } from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as tick } from 'node:timers/promises';

import { mapWithConcurrency } from '../../src/util/pool.js';

test('mapWithConcurrency keeps input order and never exceeds the limit', async () => {
  let active = 0;
  let peak = 0;

  const results = await mapWithConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (value) => {
    active += 1;
    peak = Math.max(peak, active);
    await tick();
    active -= 1;
    return value * 10;
  });

  assert.deepEqual(results, [10, 20, 30, 40, 50, 60, 70]);
  assert.equal(peak, 3);
});

test('mapWithConcurrency returns an empty list for no items', async () => {
  const results = await mapWithConcurrency([], 4, async (value: number) => value);
  assert.deepEqual(results, []);
});

test('mapWithConcurrency rejects when a worker rejects', async () => {
  await assert.rejects(
    mapWithConcurrency([1, 2], 2, async (value) => {
      if (value === 2) throw new Error('worker failed');
      return value;
    }),
    /worker failed/
  );
});

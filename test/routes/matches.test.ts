import { test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

import { createTestApp } from '../helpers/app.js';
import { buildMatchRecord, buildParticipant } from '../helpers/fixtures.js';

const seededApp = async () => {
  const context = createTestApp();
  await context.store.upsertMatch(
    buildMatchRecord({
      matchId: 'EUW1_100',
      startedAt: Date.UTC(2024, 2, 1, 18),
      participants: [buildParticipant('p-1', { kills: 11 }), buildParticipant('p-2', { teamId: 200, win: false })],
    })
  );
  return context;
};

test('match detail returns a stored match without the raw payload by default', async () => {
  const { app } = await seededApp();

  const res = await request(app).get('/v1/matches/EUW1_100');

  assert.equal(res.status, 200, res.text);
  assert.equal(res.body.match.match_id, 'EUW1_100');
  assert.equal(res.body.match.queue_id, 420);
  assert.equal(res.body.match.started_at, '2024-03-01T18:00:00.000Z');
  assert.equal(res.body.match.duration_seconds, 1800);
  assert.equal(res.body.match.participants.length, 2);
  assert.equal(res.body.match.participants[0].puuid, 'p-1');
  assert.equal(res.body.match.participants[0].kills, 11);
  assert.equal('raw' in res.body.match, false);
});

test('match detail includes the raw payload on request', async () => {
  const { app } = await seededApp();

  const res = await request(app).get('/v1/matches/EUW1_100').query({ include_raw: '1' });

  assert.equal(res.status, 200);
  assert.equal(res.body.match.raw.metadata.matchId, 'EUW1_100');
});

test('match detail rejects an unknown include_raw value', async () => {
  const { app } = await seededApp();

  const res = await request(app).get('/v1/matches/EUW1_100').query({ include_raw: 'yes' });

  assert.equal(res.status, 400);
  assert.equal(res.body.error, 'validation_error');
});

test('match detail returns 404 for unknown matches', async () => {
  const { app } = createTestApp();

  const res = await request(app).get('/v1/matches/EUW1_404');

  assert.equal(res.status, 404);
  assert.equal(res.body.error, 'match_not_found');
});

test('health check reports whether the store answers', async () => {
  const { app, store } = createTestApp();

  const healthy = await request(app).get('/health');
  assert.equal(healthy.status, 200);
  assert.deepEqual(healthy.body, { ok: true });

  store.setAvailable(false);
  const unhealthy = await request(app).get('/health');
  assert.equal(unhealthy.status, 503);
  assert.deepEqual(unhealthy.body, { ok: false, error: 'store_unavailable' });
});

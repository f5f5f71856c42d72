import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { RetryableApiError } from '../../src/api/errors.js';
import { EventBus } from '../../src/events/bus.js';
import type { DomainEvents, NewMatchEvent } from '../../src/events/types.js';
import { PollingService } from '../../src/polling/service.js';
import { MemoryStore, PlayerLookupError } from '../../src/store/index.js';
import { FakeMatchApi } from '../helpers/api.js';
import { buildMatchRecord, buildParticipant } from '../helpers/fixtures.js';
import { createRecordingLogger, silentLogger } from '../helpers/logger.js';

const T1 = Date.UTC(2024, 0, 1, 10);
const T2 = Date.UTC(2024, 0, 1, 11);
const T3 = Date.UTC(2024, 0, 1, 12);
const T4 = Date.UTC(2024, 0, 1, 13);
const NOW = Date.UTC(2024, 0, 2);

const timelineFor = (matchId: string) => ({
  metadata: { matchId },
  info: { frameInterval: 60_000, frames: [{ timestamp: 0, events: [{ type: 'PAUSE_END' }] }] },
});

const soloMatch = (matchId: string, startedAt: number, puuid = 'p-1', options: { gameMode?: string } = {}) =>
  buildMatchRecord({
    matchId,
    startedAt,
    gameMode: options.gameMode,
    participants: [buildParticipant(puuid), buildParticipant(`stranger-${matchId}`, { teamId: 200 })],
  });

let store: MemoryStore;
let api: FakeMatchApi;
let bus: EventBus<DomainEvents>;
let events: NewMatchEvent[];

const createService = (
  overrides: { concurrency?: number; matchCount?: number; liveTimelines?: boolean; logger?: typeof silentLogger } = {}
) =>
  new PollingService({
    store,
    api,
    bus,
    intervalMs: 60_000,
    concurrency: overrides.concurrency ?? 2,
    matchCount: overrides.matchCount ?? 20,
    liveTimelines: overrides.liveTimelines,
    logger: overrides.logger ?? silentLogger,
    now: () => new Date(NOW),
  });

beforeEach(async () => {
  store = new MemoryStore(() => new Date(NOW));
  api = new FakeMatchApi();
  bus = new EventBus<DomainEvents>(silentLogger);
  events = [];
  bus.subscribe('match.new', (event) => {
    events.push(event);
  });

  await store.createPlayer({ puuid: 'p-1', gameName: 'Alpha', tagLine: 'EUW', region: 'europe' });
  const seen = soloMatch('EUW1_1', T1);
  api.addMatch(seen);
  await store.upsertMatch(seen);
  await store.advanceCursor('p-1', { matchAt: new Date(T1), matchId: 'EUW1_1' });
});

test('PollingService ingests new matches, publishes one event each and advances the cursor', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.addMatch(soloMatch('EUW1_3', T3));

  const report = await createService().pollPlayerOnce('p-1');

  assert.equal(report.status, 'completed');
  assert.equal(report.matchIds, 3);
  assert.equal(report.inserted, 2);
  assert.equal(report.duplicates, 1);
  assert.equal(report.eventsPublished, 2);
  assert.equal(report.cursorAdvanced, true);
  assert.equal(report.cursor?.getTime(), T3);

  assert.deepEqual(
    events.map((event) => [event.puuid, event.match.matchId, event.playerName]),
    [
      ['p-1', 'EUW1_3', 'Alpha#EUW'],
      ['p-1', 'EUW1_2', 'Alpha#EUW'],
    ]
  );
  assert.equal(events[0].participant.puuid, 'p-1');
  assert.deepEqual(api.idQueries, [{ puuid: 'p-1', since: new Date(T1) }]);

  const player = await store.getPlayer('p-1');
  assert.equal(player?.lastMatchAt?.getTime(), T3);
  assert.equal(player?.lastMatchId, 'EUW1_3');
  assert.equal(player?.lastPolledAt?.getTime(), NOW);
});

test('PollingService follows full pages so a burst of games is not skipped', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.addMatch(soloMatch('EUW1_3', T3));
  api.addMatch(soloMatch('EUW1_4', T4));

  const report = await createService({ matchCount: 2 }).pollPlayerOnce('p-1');

  assert.equal(report.status, 'completed');
  assert.equal(report.matchIds, 4);
  assert.equal(report.inserted, 3);
  assert.equal(report.duplicates, 1);
  assert.equal(report.cursor?.getTime(), T4);
  assert.equal(api.idQueries.length, 3);
  assert.equal(await store.matchExists('EUW1_2'), true);
  assert.deepEqual(
    events.map((event) => event.match.matchId),
    ['EUW1_4', 'EUW1_3', 'EUW1_2']
  );
});

test('PollingService takes a single page for a player without a cursor', async () => {
  await store.createPlayer({ puuid: 'p-2', gameName: 'Beta', tagLine: 'EUW', region: 'europe' });
  api.addMatch(soloMatch('EUW1_2', T2, 'p-2'));
  api.addMatch(soloMatch('EUW1_3', T3, 'p-2'));
  api.addMatch(soloMatch('EUW1_4', T4, 'p-2'));

  const report = await createService({ matchCount: 2 }).pollPlayerOnce('p-2');

  assert.equal(report.matchIds, 2);
  assert.equal(report.inserted, 2);
  assert.equal(report.cursor?.getTime(), T4);
  assert.equal(api.idQueries.length, 1);
});

test('PollingService does not refetch or republish matches it already stored', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  const service = createService();

  await service.pollPlayerOnce('p-1');
  api.fetchedMatches.length = 0;
  const second = await service.pollPlayerOnce('p-1');

  assert.equal(second.inserted, 0);
  assert.equal(second.duplicates, 1);
  assert.equal(second.cursorAdvanced, false);
  assert.deepEqual(api.fetchedMatches, []);
  assert.equal(events.length, 1);
});

test('PollingService publishes to every tracked participant of a new match', async () => {
  await store.createPlayer({ puuid: 'p-2', gameName: 'Beta', tagLine: 'EUW', region: 'europe' });
  api.addMatch(
    buildMatchRecord({
      matchId: 'EUW1_2',
      startedAt: T2,
      participants: [buildParticipant('p-1'), buildParticipant('p-2', { teamId: 200, kills: 11 })],
    })
  );

  const report = await createService().pollPlayerOnce('p-1');

  assert.equal(report.eventsPublished, 2);
  assert.deepEqual(
    events.map((event) => [event.puuid, event.participant.kills]).sort(),
    [
      ['p-1', 5],
      ['p-2', 11],
    ]
  );
});

test('PollingService aborts on a retryable failure without moving the cursor and recovers next time', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.addMatch(soloMatch('EUW1_3', T3));
  api.failures.set(
    'EUW1_2',
    new RetryableApiError('Request to match failed (timeout)', 'timeout', { endpoint: 'match' })
  );
  const { logger, events: logged } = createRecordingLogger();
  const service = createService({ logger });

  const failed = await service.pollPlayerOnce('p-1');

  assert.equal(failed.status, 'aborted');
  assert.equal(failed.error, 'Request to match failed (timeout)');
  assert.equal(failed.inserted, 1);
  assert.equal(failed.cursorAdvanced, false);
  assert.equal((await store.getPlayer('p-1'))?.lastMatchAt?.getTime(), T1);
  assert.deepEqual(logged('warn'), ['match_fetch_failed']);

  const retried = await service.pollPlayerOnce('p-1');

  assert.equal(retried.status, 'completed');
  assert.equal(retried.inserted, 1);
  assert.equal(retried.duplicates, 2);
  assert.equal((await store.getPlayer('p-1'))?.lastMatchAt?.getTime(), T3);
  assert.deepEqual(
    events.map((event) => event.match.matchId),
    ['EUW1_3', 'EUW1_2']
  );
});

test('PollingService aborts when the match id listing fails', async () => {
  api.failures.set('ids:p-1', new RetryableApiError('Rate limited on match_ids', 'rate_limited', { endpoint: 'match_ids' }));

  const report = await createService().pollPlayerOnce('p-1');

  assert.equal(report.status, 'aborted');
  assert.equal(report.matchIds, 0);
  assert.deepEqual(api.fetchedMatches, []);
});

test('PollingService skips a permanently failing match and keeps going', async () => {
  api.addMissingMatch('p-1', 'EUW1_GONE');
  api.addMatch(soloMatch('EUW1_3', T3));

  const report = await createService().pollPlayerOnce('p-1');

  assert.equal(report.status, 'completed');
  assert.equal(report.failed, 1);
  assert.equal(report.inserted, 1);
  assert.equal(report.cursor?.getTime(), T3);
});

test('PollingService counts filtered matches toward the cursor without storing them', async () => {
  api.addMatch(soloMatch('EUW1_4', T4, 'p-1', { gameMode: 'ARAM' }));

  const report = await createService().pollPlayerOnce('p-1');

  assert.equal(report.filtered, 1);
  assert.equal(report.inserted, 0);
  assert.equal(await store.matchExists('EUW1_4'), false);
  assert.equal(report.cursor?.getTime(), T4);
  assert.equal(events.length, 0);
});

test('PollingService pauses the tick while the store is unreachable', async () => {
  store.setAvailable(false);

  const tick = await createService().runTick();

  assert.equal(tick.paused, true);
  assert.deepEqual(tick.players, []);
  assert.deepEqual(api.idQueries, []);
});

test('PollingService polls every pollable player in a tick', async () => {
  await store.createPlayer({ puuid: 'p-2', gameName: 'Beta', tagLine: 'EUW', region: 'europe' });
  await store.createPlayer({ puuid: 'p-3', gameName: 'Gamma', tagLine: 'EUW', region: 'europe', pollingEnabled: false });
  await store.createPlayer({ puuid: 'p-4', gameName: 'Delta', tagLine: 'EUW', region: 'europe' });
  api.addMatch(soloMatch('EUW1_20', T2, 'p-2'));
  api.failures.set('ids:p-4', new Error('socket hang up'));

  const tick = await createService({ concurrency: 2 }).runTick();

  assert.equal(tick.paused, false);
  assert.deepEqual(
    tick.players.map((report) => [report.puuid, report.status, report.inserted]),
    [
      ['p-1', 'completed', 0],
      ['p-2', 'completed', 1],
      ['p-4', 'aborted', 0],
    ]
  );
});

test('PollingService shares a tick that is already running', async () => {
  const service = createService();
  const [first, second] = await Promise.all([service.runTick(), service.runTick()]);

  assert.equal(first, second);
  assert.equal(api.idQueries.length, 1);
});

test('PollingService backfills the whole history', async () => {
  api.addMatch(soloMatch('EUW1_0', T1 - 3_600_000));
  api.addMatch(soloMatch('EUW1_2', T2));

  const report = await createService().backfillPlayer('p-1');

  assert.equal(report.mode, 'backfill');
  assert.equal(report.matchIds, 3);
  assert.equal(report.inserted, 2);
  assert.equal(report.cursor?.getTime(), T2);
  assert.equal(await store.matchExists('EUW1_0'), true);
});

test('PollingService stores timelines for backfilled matches', async () => {
  api.addMatch(soloMatch('EUW1_0', T1 - 3_600_000));
  api.timelines.set('EUW1_0', timelineFor('EUW1_0'));

  await createService().backfillPlayer('p-1');

  assert.deepEqual(api.fetchedTimelines, ['EUW1_0']);
  assert.deepEqual((await store.getMatch('EUW1_0'))?.timeline, timelineFor('EUW1_0'));
});

test('PollingService leaves timelines out of live polls by default', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.timelines.set('EUW1_2', timelineFor('EUW1_2'));

  await createService().pollPlayerOnce('p-1');

  assert.deepEqual(api.fetchedTimelines, []);
  assert.equal((await store.getMatch('EUW1_2'))?.timeline, null);
});

test('PollingService fetches timelines during live polls when enabled', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.timelines.set('EUW1_2', timelineFor('EUW1_2'));

  const report = await createService({ liveTimelines: true }).pollPlayerOnce('p-1');

  assert.equal(report.inserted, 1);
  assert.deepEqual(api.fetchedTimelines, ['EUW1_2']);
  assert.deepEqual((await store.getMatch('EUW1_2'))?.timeline, timelineFor('EUW1_2'));
});

test('PollingService stores the match without a timeline when the timeline fetch fails', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.failures.set(
    'timeline:EUW1_2',
    new RetryableApiError('Request to match_timeline failed (timeout)', 'timeout', { endpoint: 'match_timeline' })
  );
  const { logger, events: logged } = createRecordingLogger();

  const report = await createService({ liveTimelines: true, logger }).pollPlayerOnce('p-1');

  assert.equal(report.status, 'completed');
  assert.equal(report.inserted, 1);
  assert.equal(events.length, 1);
  assert.equal((await store.getMatch('EUW1_2'))?.timeline, null);
  assert.deepEqual(logged('warn'), ['match_timeline_unavailable']);
});

test('PollingService serializes a live poll and a backfill of the same player', async () => {
  api.addMatch(soloMatch('EUW1_2', T2));
  api.addMatch(soloMatch('EUW1_3', T3));
  const service = createService();

  const [live, backfill] = await Promise.all([service.pollPlayerOnce('p-1'), service.backfillPlayer('p-1')]);

  assert.equal(live.inserted + backfill.inserted, 2);
  assert.equal(backfill.inserted, 0);
  assert.equal(events.length, 2);
});

test('PollingService rejects polls for untracked players', async () => {
  await assert.rejects(createService().pollPlayerOnce('missing'), PlayerLookupError);
});

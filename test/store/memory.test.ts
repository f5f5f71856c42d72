import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  DataIntegrityError,
  MemoryStore,
  PlayerConflictError,
  PlayerLookupError,
} from '../../src/store/index.js';
import { buildMatchRecord, buildParticipant } from '../helpers/fixtures.js';

const T1 = Date.UTC(2024, 0, 1, 10);
const T2 = Date.UTC(2024, 0, 1, 11);

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(async () => {
    store = new MemoryStore(() => new Date(T1));
    await store.createPlayer({ puuid: 'p-1', gameName: 'Alpha', tagLine: 'EUW', region: 'europe' });
  });

  describe('players', () => {
    it('rejects a second registration of the same puuid', async () => {
      await assert.rejects(
        store.createPlayer({ puuid: 'p-1', gameName: 'Alpha', tagLine: 'EUW', region: 'europe' }),
        PlayerConflictError
      );
    });

    it('lists only players with polling enabled as pollable', async () => {
      await store.createPlayer({
        puuid: 'p-2',
        gameName: 'Beta',
        tagLine: 'EUW',
        region: 'europe',
        pollingEnabled: false,
      });

      assert.deepEqual(
        (await store.listPlayers()).map((player) => player.puuid),
        ['p-1', 'p-2']
      );
      assert.deepEqual(
        (await store.listPollablePlayers()).map((player) => player.puuid),
        ['p-1']
      );
    });

    it('updates and removes players', async () => {
      const updated = await store.updatePlayer('p-1', { pollingEnabled: false, gameName: 'Alpha2' });
      assert.equal(updated.pollingEnabled, false);
      assert.equal(updated.gameName, 'Alpha2');

      await store.removePlayer('p-1');
      assert.equal(await store.getPlayer('p-1'), null);
      await assert.rejects(store.updatePlayer('p-1', { pollingEnabled: true }), PlayerLookupError);
    });
  });

  describe('cursor', () => {
    it('only moves forward', async () => {
      const first = await store.advanceCursor('p-1', { matchAt: new Date(T2), matchId: 'EUW1_2' });
      assert.deepEqual(first, { advanced: true, cursor: new Date(T2) });

      const older = await store.advanceCursor('p-1', { matchAt: new Date(T1), matchId: 'EUW1_1' });
      assert.deepEqual(older, { advanced: false, cursor: new Date(T2) });

      const same = await store.advanceCursor('p-1', { matchAt: new Date(T2), matchId: 'EUW1_2b' });
      assert.equal(same.advanced, false);

      const player = await store.getPlayer('p-1');
      assert.equal(player?.lastMatchAt?.getTime(), T2);
      assert.equal(player?.lastMatchId, 'EUW1_2');
    });

    it('fails for an unknown player', async () => {
      await assert.rejects(
        store.advanceCursor('missing', { matchAt: new Date(T2), matchId: 'EUW1_2' }),
        PlayerLookupError
      );
    });
  });

  describe('matches', () => {
    it('inserts a match once and keeps the first stored row', async () => {
      const original = buildMatchRecord({
        matchId: 'EUW1_1',
        startedAt: T1,
        participants: [buildParticipant('p-1', { kills: 4 })],
      });
      const replay = buildMatchRecord({
        matchId: 'EUW1_1',
        startedAt: T1,
        participants: [buildParticipant('p-1', { kills: 40 })],
      });

      assert.deepEqual(await store.upsertMatch(original), { matchId: 'EUW1_1', status: 'INSERTED' });
      assert.deepEqual(await store.upsertMatch(replay), { matchId: 'EUW1_1', status: 'ALREADY_EXISTS' });

      const stored = await store.getMatch('EUW1_1');
      assert.deepEqual(stored, original);
      assert.equal(await store.matchExists('EUW1_1'), true);
    });

    it('hands out copies of stored rows', async () => {
      await store.upsertMatch(
        buildMatchRecord({ matchId: 'EUW1_1', startedAt: T1, participants: [buildParticipant('p-1')] })
      );

      const first = await store.getMatch('EUW1_1');
      assert.ok(first);
      first.participants[0].kills = 99;

      const second = await store.getMatch('EUW1_1');
      assert.equal(second?.participants[0].kills, 5);
    });

    it('refuses a match without participants', async () => {
      const record = buildMatchRecord({ matchId: 'EUW1_1', startedAt: T1, participants: [buildParticipant('p-1')] });

      await assert.rejects(store.upsertMatch({ ...record, participants: [] }), (err: unknown) => {
        assert.ok(err instanceof DataIntegrityError);
        assert.equal(err.code, 'invalid_match');
        return true;
      });
      assert.equal(await store.matchExists('EUW1_1'), false);
    });

    it('lists participant samples, optionally for one player', async () => {
      await store.upsertMatch(
        buildMatchRecord({
          matchId: 'EUW1_1',
          startedAt: T1,
          participants: [buildParticipant('p-1'), buildParticipant('p-2')],
        })
      );

      assert.equal((await store.listParticipantSamples()).length, 2);
      const own = await store.listParticipantSamples({ puuid: 'p-2' });
      assert.equal(own.length, 1);
      assert.equal(own[0].matchId, 'EUW1_1');
      assert.equal(own[0].durationSeconds, 1800);
      assert.equal(own[0].stats.puuid, 'p-2');
    });

    it('narrows participant samples by champion and role', async () => {
      await store.upsertMatch(
        buildMatchRecord({
          matchId: 'EUW1_1',
          startedAt: T1,
          participants: [
            buildParticipant('p-1'),
            buildParticipant('p-2', { teamPosition: 'TOP' }),
            buildParticipant('p-3', { championId: 86, championName: 'Garen', teamPosition: 'TOP' }),
          ],
        })
      );

      const annie = await store.listParticipantSamples({ championId: 1 });
      assert.deepEqual(
        annie.map((sample) => sample.stats.puuid),
        ['p-1', 'p-2']
      );
      const annieMid = await store.listParticipantSamples({ championId: 1, role: 'MIDDLE' });
      assert.deepEqual(
        annieMid.map((sample) => sample.stats.puuid),
        ['p-1']
      );
      const top = await store.listParticipantSamples({ role: 'TOP' });
      assert.deepEqual(
        top.map((sample) => sample.stats.puuid),
        ['p-2', 'p-3']
      );
    });
  });

  describe('personal records', () => {
    it('stores max and min independently and clears them with the player', async () => {
      await store.setPersonalRecord({
        puuid: 'p-1',
        statField: 'kills',
        kind: 'max',
        value: 7,
        matchId: 'EUW1_1',
        achievedAt: new Date(T1),
      });
      await store.setPersonalRecord({
        puuid: 'p-1',
        statField: 'kills',
        kind: 'min',
        value: 1,
        matchId: 'EUW1_2',
        achievedAt: new Date(T2),
      });

      assert.equal((await store.getPersonalRecord('p-1', 'kills', 'max'))?.value, 7);
      assert.equal((await store.getPersonalRecord('p-1', 'kills', 'min'))?.value, 1);
      assert.deepEqual(
        (await store.listPersonalRecords('p-1')).map((record) => `${record.statField}:${record.kind}`),
        ['kills:max', 'kills:min']
      );

      await store.removePlayer('p-1');
      assert.deepEqual(await store.listPersonalRecords('p-1'), []);
    });

    it('keeps its own copy of the achievement time', async () => {
      const achievedAt = new Date(T1);
      await store.setPersonalRecord({
        puuid: 'p-1',
        statField: 'kills',
        kind: 'max',
        value: 9,
        matchId: 'EUW1_1',
        achievedAt,
      });

      achievedAt.setTime(T2);

      assert.equal((await store.getPersonalRecord('p-1', 'kills', 'max'))?.achievedAt.getTime(), T1);
    });

    it('refuses a non-finite value', async () => {
      await assert.rejects(
        store.setPersonalRecord({
          puuid: 'p-1',
          statField: 'kda',
          kind: 'max',
          value: Number.POSITIVE_INFINITY,
          matchId: 'EUW1_1',
          achievedAt: new Date(T1),
        }),
        DataIntegrityError
      );
    });
  });

  it('rejects pings while unavailable', async () => {
    await store.ping();
    store.setAvailable(false);
    await assert.rejects(store.ping(), /unavailable/);
  });
});

import { and, asc, eq, inArray, isNull, lt, or, sql } from 'drizzle-orm';

import { getDb, type DbClient } from '../db/client.js';
import { matchParticipants, matches, personalRecords, trackedPlayers } from '../db/schema.js';
import type {
  CursorAdvanceInput,
  CursorAdvanceResult,
  MatchRecord,
  MatchStore,
  ParticipantSample,
  ParticipantSampleQuery,
  PersonalRecord,
  PersonalRecordInput,
  PersonalRecordKind,
  PlayerCreateInput,
  PlayerUpdateInput,
  TrackedPlayer,
  UpsertMatchResult,
} from './types.js';
import { PlayerConflictError, PlayerLookupError } from './errors.js';
import { assertValidMatch, assertValidRecord } from './helpers.js';
import {
  toMatchRecord,
  toParticipantInsertRows,
  toParticipantStats,
  toPersonalRecord,
  toTrackedPlayer,
} from './postgres/rows.js';

const now = () => new Date();

export class PostgresStore implements MatchStore {
  constructor(private readonly db: DbClient = getDb()) {}

  async ping(): Promise<void> {
    await this.db.execute(sql`SELECT 1`);
  }

  async createPlayer(input: PlayerCreateInput): Promise<TrackedPlayer> {
    const timestamp = now();
    const rows = await this.db
      .insert(trackedPlayers)
      .values({
        puuid: input.puuid,
        gameName: input.gameName,
        tagLine: input.tagLine,
        region: input.region,
        pollingEnabled: input.pollingEnabled ?? true,
        createdAt: timestamp,
        updatedAt: timestamp,
      })
      .onConflictDoNothing({ target: trackedPlayers.puuid })
      .returning();

    const row = rows.at(0);
    if (!row) {
      throw new PlayerConflictError(`Player already tracked: ${input.puuid}`, input.puuid);
    }
    return toTrackedPlayer(row);
  }

  async getPlayer(puuid: string): Promise<TrackedPlayer | null> {
    const rows = await this.db.select().from(trackedPlayers).where(eq(trackedPlayers.puuid, puuid)).limit(1);
    const row = rows.at(0);
    return row ? toTrackedPlayer(row) : null;
  }

  async listPlayers(): Promise<TrackedPlayer[]> {
    const rows = await this.db
      .select()
      .from(trackedPlayers)
      .orderBy(asc(trackedPlayers.createdAt), asc(trackedPlayers.puuid));
    return rows.map(toTrackedPlayer);
  }

  async listPollablePlayers(): Promise<TrackedPlayer[]> {
    const rows = await this.db
      .select()
      .from(trackedPlayers)
      .where(eq(trackedPlayers.pollingEnabled, true))
      .orderBy(asc(trackedPlayers.createdAt), asc(trackedPlayers.puuid));
    return rows.map(toTrackedPlayer);
  }

  async findPlayersByPuuids(puuids: string[]): Promise<TrackedPlayer[]> {
    const unique = Array.from(new Set(puuids));
    if (!unique.length) return [];
    const rows = await this.db.select().from(trackedPlayers).where(inArray(trackedPlayers.puuid, unique));
    return rows.map(toTrackedPlayer);
  }

  async updatePlayer(puuid: string, input: PlayerUpdateInput): Promise<TrackedPlayer> {
    const rows = await this.db
      .update(trackedPlayers)
      .set({
        ...(input.gameName !== undefined ? { gameName: input.gameName } : {}),
        ...(input.tagLine !== undefined ? { tagLine: input.tagLine } : {}),
        ...(input.region !== undefined ? { region: input.region } : {}),
        ...(input.pollingEnabled !== undefined ? { pollingEnabled: input.pollingEnabled } : {}),
        updatedAt: now(),
      })
      .where(eq(trackedPlayers.puuid, puuid))
      .returning();

    const row = rows.at(0);
    if (!row) {
      throw new PlayerLookupError(`Player not found: ${puuid}`, { puuid });
    }
    return toTrackedPlayer(row);
  }

  async removePlayer(puuid: string): Promise<void> {
    const rows = await this.db
      .delete(trackedPlayers)
      .where(eq(trackedPlayers.puuid, puuid))
      .returning({ puuid: trackedPlayers.puuid });
    if (!rows.length) {
      throw new PlayerLookupError(`Player not found: ${puuid}`, { puuid });
    }
  }

  async markPolled(puuid: string, polledAt: Date): Promise<void> {
    await this.db.update(trackedPlayers).set({ lastPolledAt: polledAt }).where(eq(trackedPlayers.puuid, puuid));
  }

  async advanceCursor(puuid: string, input: CursorAdvanceInput): Promise<CursorAdvanceResult> {
    const updated = await this.db
      .update(trackedPlayers)
      .set({ lastMatchAt: input.matchAt, lastMatchId: input.matchId, updatedAt: now() })
      .where(
        and(
          eq(trackedPlayers.puuid, puuid),
          or(isNull(trackedPlayers.lastMatchAt), lt(trackedPlayers.lastMatchAt, input.matchAt))
        )
      )
      .returning({ lastMatchAt: trackedPlayers.lastMatchAt });

    if (updated.length) {
      return { advanced: true, cursor: updated[0].lastMatchAt };
    }

    const rows = await this.db
      .select({ lastMatchAt: trackedPlayers.lastMatchAt })
      .from(trackedPlayers)
      .where(eq(trackedPlayers.puuid, puuid))
      .limit(1);
    const current = rows.at(0);
    if (!current) {
      throw new PlayerLookupError(`Player not found: ${puuid}`, { puuid });
    }
    return { advanced: false, cursor: current.lastMatchAt };
  }

  async upsertMatch(record: MatchRecord): Promise<UpsertMatchResult> {
    assertValidMatch(record);

    return this.db.transaction(async (tx): Promise<UpsertMatchResult> => {
      const inserted = await tx
        .insert(matches)
        .values({
          matchId: record.matchId,
          platformId: record.platformId,
          queueId: record.queueId,
          gameMode: record.gameMode,
          gameVersion: record.gameVersion,
          startedAt: record.startedAt,
          durationSeconds: record.durationSeconds,
          timeline: record.timeline,
          raw: record.raw,
        })
        .onConflictDoNothing({ target: matches.matchId })
        .returning({ matchId: matches.matchId });

      if (!inserted.length) {
        return { matchId: record.matchId, status: 'ALREADY_EXISTS' };
      }

      await tx.insert(matchParticipants).values(toParticipantInsertRows(record));
      return { matchId: record.matchId, status: 'INSERTED' };
    });
  }

  async getMatch(matchId: string): Promise<MatchRecord | null> {
    const rows = await this.db.select().from(matches).where(eq(matches.matchId, matchId)).limit(1);
    const row = rows.at(0);
    if (!row) return null;

    const participants = await this.db
      .select()
      .from(matchParticipants)
      .where(eq(matchParticipants.matchId, matchId))
      .orderBy(asc(matchParticipants.participantIndex));
    return toMatchRecord(row, participants);
  }

  async matchExists(matchId: string): Promise<boolean> {
    const rows = await this.db
      .select({ matchId: matches.matchId })
      .from(matches)
      .where(eq(matches.matchId, matchId))
      .limit(1);
    return rows.length > 0;
  }

  async listParticipantSamples(query: ParticipantSampleQuery = {}): Promise<ParticipantSample[]> {
    const rows = await this.db
      .select({ participant: matchParticipants, durationSeconds: matches.durationSeconds })
      .from(matchParticipants)
      .innerJoin(matches, eq(matches.matchId, matchParticipants.matchId))
      .where(
        and(
          query.puuid ? eq(matchParticipants.puuid, query.puuid) : undefined,
          query.championId !== undefined ? eq(matchParticipants.championId, query.championId) : undefined,
          query.role ? eq(matchParticipants.role, query.role) : undefined
        )
      );

    return rows.map((row) => ({
      matchId: row.participant.matchId,
      durationSeconds: row.durationSeconds,
      stats: toParticipantStats(row.participant),
    }));
  }

  async getPersonalRecord(
    puuid: string,
    statField: string,
    kind: PersonalRecordKind
  ): Promise<PersonalRecord | null> {
    const rows = await this.db
      .select()
      .from(personalRecords)
      .where(
        and(
          eq(personalRecords.puuid, puuid),
          eq(personalRecords.statField, statField),
          eq(personalRecords.kind, kind)
        )
      )
      .limit(1);
    const row = rows.at(0);
    return row ? toPersonalRecord(row) : null;
  }

  async setPersonalRecord(input: PersonalRecordInput): Promise<PersonalRecord> {
    assertValidRecord(input);
    const updatedAt = now();
    const rows = await this.db
      .insert(personalRecords)
      .values({ ...input, updatedAt })
      .onConflictDoUpdate({
        target: [personalRecords.puuid, personalRecords.statField, personalRecords.kind],
        set: {
          value: input.value,
          matchId: input.matchId,
          achievedAt: input.achievedAt,
          updatedAt,
        },
      })
      .returning();
    return toPersonalRecord(rows[0]);
  }

  async listPersonalRecords(puuid: string): Promise<PersonalRecord[]> {
    const rows = await this.db
      .select()
      .from(personalRecords)
      .where(eq(personalRecords.puuid, puuid))
      .orderBy(asc(personalRecords.statField), asc(personalRecords.kind));
    return rows.map(toPersonalRecord);
  }

  async resetPersonalRecords(puuid: string): Promise<number> {
    const rows = await this.db
      .delete(personalRecords)
      .where(eq(personalRecords.puuid, puuid))
      .returning({ puuid: personalRecords.puuid });
    return rows.length;
  }
}

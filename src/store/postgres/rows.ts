import type { matchParticipants, matches, personalRecords, trackedPlayers } from '../../db/schema.js';
import { isRegion } from '../contracts/common.js';
import type {
  MatchParticipantStats,
  MatchRecord,
  PersonalRecord,
  PersonalRecordKind,
  TrackedPlayer,
} from '../types.js';

type PlayerRow = typeof trackedPlayers.$inferSelect;
type MatchRow = typeof matches.$inferSelect;
type ParticipantRow = typeof matchParticipants.$inferSelect;
type PersonalRecordRow = typeof personalRecords.$inferSelect;

export type ParticipantInsertRow = typeof matchParticipants.$inferInsert;

const isRecordKind = (value: string): value is PersonalRecordKind => value === 'max' || value === 'min';

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const toTrackedPlayer = (row: PlayerRow): TrackedPlayer => {
  if (!isRegion(row.region)) {
    throw new Error(`Stored player ${row.puuid} has unknown region ${row.region}`);
  }
  return {
    puuid: row.puuid,
    gameName: row.gameName,
    tagLine: row.tagLine,
    region: row.region,
    pollingEnabled: row.pollingEnabled,
    lastMatchAt: row.lastMatchAt,
    lastMatchId: row.lastMatchId,
    lastPolledAt: row.lastPolledAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
};

export const toParticipantStats = (row: ParticipantRow): MatchParticipantStats => ({
  puuid: row.puuid,
  riotIdGameName: row.riotIdGameName,
  riotIdTagline: row.riotIdTagline,
  championId: row.championId,
  championName: row.championName,
  role: row.role,
  teamId: row.teamId,
  win: row.win,
  kills: row.kills,
  deaths: row.deaths,
  assists: row.assists,
  totalDamageDealtToChampions: row.totalDamageDealtToChampions,
  goldEarned: row.goldEarned,
  visionScore: row.visionScore,
  totalMinionsKilled: row.totalMinionsKilled,
  timePlayedSeconds: row.timePlayedSeconds,
});

export const toParticipantInsertRows = (record: MatchRecord): ParticipantInsertRow[] =>
  record.participants.map((participant, participantIndex) => ({
    matchId: record.matchId,
    participantIndex,
    ...participant,
  }));

export const toMatchRecord = (row: MatchRow, participants: ParticipantRow[]): MatchRecord => ({
  matchId: row.matchId,
  platformId: row.platformId,
  queueId: row.queueId,
  gameMode: row.gameMode,
  gameVersion: row.gameVersion,
  startedAt: row.startedAt,
  durationSeconds: row.durationSeconds,
  participants: [...participants]
    .sort((a, b) => a.participantIndex - b.participantIndex)
    .map(toParticipantStats),
  timeline: isJsonObject(row.timeline) ? row.timeline : null,
  raw: row.raw,
});

export const toPersonalRecord = (row: PersonalRecordRow): PersonalRecord => {
  if (!isRecordKind(row.kind)) {
    throw new Error(`Stored personal record has unknown kind ${row.kind}`);
  }
  return {
    puuid: row.puuid,
    statField: row.statField,
    kind: row.kind,
    value: row.value,
    matchId: row.matchId,
    achievedAt: row.achievedAt,
    updatedAt: row.updatedAt,
  };
};

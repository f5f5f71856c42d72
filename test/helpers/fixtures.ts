import type { MatchResponse, ParticipantResponse } from '../../src/api/schemas.js';
import { normalizeMatch } from '../../src/api/client.js';
import type { MatchRecord } from '../../src/store/index.js';

export const MATCH_DURATION_SECONDS = 1800;

export const buildParticipant = (
  puuid: string,
  overrides: Partial<ParticipantResponse> = {}
): ParticipantResponse => ({
  puuid,
  riotIdGameName: `name-${puuid}`,
  riotIdTagline: 'EUW',
  championId: 1,
  championName: 'Annie',
  teamPosition: 'MIDDLE',
  teamId: 100,
  win: true,
  kills: 5,
  deaths: 3,
  assists: 7,
  totalDamageDealtToChampions: 20_000,
  goldEarned: 12_000,
  visionScore: 20,
  totalMinionsKilled: 180,
  timePlayed: MATCH_DURATION_SECONDS,
  ...overrides,
});

export interface MatchPayloadOptions {
  matchId: string;
  startedAt: number;
  participants: ParticipantResponse[];
  queueId?: number;
  gameMode?: string;
  durationSeconds?: number;
}

/** A ranked solo queue payload shaped like the match-v5 endpoint. */
export const buildMatchPayload = (options: MatchPayloadOptions): MatchResponse => {
  const durationSeconds = options.durationSeconds ?? MATCH_DURATION_SECONDS;
  return {
    metadata: {
      matchId: options.matchId,
      participants: options.participants.map((participant) => participant.puuid),
    },
    info: {
      gameCreation: options.startedAt - 60_000,
      gameStartTimestamp: options.startedAt,
      gameEndTimestamp: options.startedAt + durationSeconds * 1000,
      gameDuration: durationSeconds,
      gameMode: options.gameMode ?? 'CLASSIC',
      gameVersion: '14.1.553.1234',
      queueId: options.queueId ?? 420,
      platformId: 'EUW1',
      participants: options.participants,
    },
  };
};

export const buildMatchRecord = (options: MatchPayloadOptions): MatchRecord => normalizeMatch(buildMatchPayload(options));

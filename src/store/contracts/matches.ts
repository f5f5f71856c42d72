export interface MatchParticipantStats {
  puuid: string;
  riotIdGameName: string | null;
  riotIdTagline: string | null;
  championId: number;
  championName: string;
  role: string | null;
  teamId: number;
  win: boolean;
  kills: number;
  deaths: number;
  assists: number;
  totalDamageDealtToChampions: number;
  goldEarned: number;
  visionScore: number;
  totalMinionsKilled: number;
  timePlayedSeconds: number | null;
}

export interface MatchRecord {
  matchId: string;
  platformId: string;
  queueId: number;
  gameMode: string;
  gameVersion: string;
  startedAt: Date;
  durationSeconds: number;
  participants: MatchParticipantStats[];
  timeline: Record<string, unknown> | null;
  raw: unknown;
}

export type UpsertMatchStatus = 'INSERTED' | 'ALREADY_EXISTS';

export interface UpsertMatchResult {
  matchId: string;
  status: UpsertMatchStatus;
}

export interface ParticipantSample {
  matchId: string;
  durationSeconds: number;
  stats: MatchParticipantStats;
}

export interface ParticipantSampleQuery {
  /** Restricts samples to one player; omitted means every stored participant. */
  puuid?: string;
  championId?: number;
  role?: string;
}

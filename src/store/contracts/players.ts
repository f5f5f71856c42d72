import type { Region } from './common.js';

export interface TrackedPlayer {
  puuid: string;
  gameName: string;
  tagLine: string;
  region: Region;
  pollingEnabled: boolean;
  /** Start time of the newest processed match; the polling cursor. */
  lastMatchAt: Date | null;
  lastMatchId: string | null;
  lastPolledAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface PlayerCreateInput {
  puuid: string;
  gameName: string;
  tagLine: string;
  region: Region;
  pollingEnabled?: boolean;
}

export interface PlayerUpdateInput {
  gameName?: string;
  tagLine?: string;
  region?: Region;
  pollingEnabled?: boolean;
}

export interface CursorAdvanceInput {
  matchAt: Date;
  matchId: string;
}

export interface CursorAdvanceResult {
  advanced: boolean;
  /** Cursor as stored after the call. */
  cursor: Date | null;
}

export const formatRiotId = (player: Pick<TrackedPlayer, 'gameName' | 'tagLine'>) =>
  `${player.gameName}#${player.tagLine}`;

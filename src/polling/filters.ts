import type { MatchRecord } from '../store/index.js';

export const BOT_PUUID = 'BOT';

export interface IngestionFilterOptions {
  /** Empty means every queue is accepted. */
  allowedQueueIds: readonly number[];
  /** Empty means every game mode is accepted. */
  allowedGameModes: readonly string[];
  minGameDurationSeconds: number;
}

export type IngestionSkipReason = 'queue_not_allowed' | 'game_mode_not_allowed' | 'game_too_short' | 'bot_participant';

export const DEFAULT_INGESTION_FILTERS: IngestionFilterOptions = {
  allowedQueueIds: [400, 420, 440, 480],
  allowedGameModes: ['CLASSIC'],
  minGameDurationSeconds: 600,
};

/** Returns why a fetched match should not be stored, or null when it should be. */
export const checkIngestion = (match: MatchRecord, options: IngestionFilterOptions): IngestionSkipReason | null => {
  if (options.allowedGameModes.length && !options.allowedGameModes.includes(match.gameMode)) {
    return 'game_mode_not_allowed';
  }
  if (options.allowedQueueIds.length && !options.allowedQueueIds.includes(match.queueId)) {
    return 'queue_not_allowed';
  }
  if (match.durationSeconds < options.minGameDurationSeconds) {
    return 'game_too_short';
  }
  if (match.participants.some((participant) => participant.puuid === BOT_PUUID)) {
    return 'bot_participant';
  }
  return null;
};

import type { MatchParticipantStats, MatchRecord, Region } from '../store/index.js';

export interface NewMatchEvent {
  puuid: string;
  playerName: string;
  region: Region;
  match: MatchRecord;
  /** The tracked player's own stat line in `match`. */
  participant: MatchParticipantStats;
  publishedAt: Date;
}

export interface DomainEvents {
  'match.new': NewMatchEvent;
}

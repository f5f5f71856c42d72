import type {
  CursorAdvanceInput,
  CursorAdvanceResult,
  PlayerCreateInput,
  PlayerUpdateInput,
  TrackedPlayer,
} from './players.js';
import type { MatchRecord, ParticipantSample, ParticipantSampleQuery, UpsertMatchResult } from './matches.js';
import type { PersonalRecord, PersonalRecordInput, PersonalRecordKind } from './records.js';

export interface MatchStore {
  /** Rejects when the backing storage cannot be reached. */
  ping(): Promise<void>;

  createPlayer(input: PlayerCreateInput): Promise<TrackedPlayer>;
  getPlayer(puuid: string): Promise<TrackedPlayer | null>;
  listPlayers(): Promise<TrackedPlayer[]>;
  listPollablePlayers(): Promise<TrackedPlayer[]>;
  findPlayersByPuuids(puuids: string[]): Promise<TrackedPlayer[]>;
  updatePlayer(puuid: string, input: PlayerUpdateInput): Promise<TrackedPlayer>;
  removePlayer(puuid: string): Promise<void>;
  markPolled(puuid: string, polledAt: Date): Promise<void>;

  /**
   * Moves the cursor forward only when `input.matchAt` is strictly newer than the
   * stored one. Any other call leaves the row untouched and reports `advanced: false`.
   */
  advanceCursor(puuid: string, input: CursorAdvanceInput): Promise<CursorAdvanceResult>;

  /** Inserts the match and its participants once; later calls report `ALREADY_EXISTS`. */
  upsertMatch(record: MatchRecord): Promise<UpsertMatchResult>;
  getMatch(matchId: string): Promise<MatchRecord | null>;
  matchExists(matchId: string): Promise<boolean>;
  listParticipantSamples(query?: ParticipantSampleQuery): Promise<ParticipantSample[]>;

  getPersonalRecord(puuid: string, statField: string, kind: PersonalRecordKind): Promise<PersonalRecord | null>;
  /** Unconditional overwrite; the caller has already decided the value is a new extreme. */
  setPersonalRecord(input: PersonalRecordInput): Promise<PersonalRecord>;
  listPersonalRecords(puuid: string): Promise<PersonalRecord[]>;
  resetPersonalRecords(puuid: string): Promise<number>;
}

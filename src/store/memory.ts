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

const recordKey = (puuid: string, statField: string, kind: PersonalRecordKind) => `${puuid}|${statField}|${kind}`;

/**
 * Process-local store used for development and tests. Rows are cloned on the way
 * in and out so callers never share references with stored state.
 */
export class MemoryStore implements MatchStore {
  private players = new Map<string, TrackedPlayer>();
  private matches = new Map<string, MatchRecord>();
  private records = new Map<string, PersonalRecord>();
  private available = true;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /** Simulates losing the backing storage; `ping` rejects until restored. */
  setAvailable(available: boolean) {
    this.available = available;
  }

  async ping(): Promise<void> {
    if (!this.available) {
      throw new Error('Memory store marked unavailable');
    }
  }

  async createPlayer(input: PlayerCreateInput): Promise<TrackedPlayer> {
    if (this.players.has(input.puuid)) {
      throw new PlayerConflictError(`Player already tracked: ${input.puuid}`, input.puuid);
    }
    const timestamp = this.now();
    const player: TrackedPlayer = {
      puuid: input.puuid,
      gameName: input.gameName,
      tagLine: input.tagLine,
      region: input.region,
      pollingEnabled: input.pollingEnabled ?? true,
      lastMatchAt: null,
      lastMatchId: null,
      lastPolledAt: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.players.set(player.puuid, player);
    return structuredClone(player);
  }

  async getPlayer(puuid: string): Promise<TrackedPlayer | null> {
    const player = this.players.get(puuid);
    return player ? structuredClone(player) : null;
  }

  async listPlayers(): Promise<TrackedPlayer[]> {
    return Array.from(this.players.values())
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.puuid.localeCompare(b.puuid))
      .map((player) => structuredClone(player));
  }

  async listPollablePlayers(): Promise<TrackedPlayer[]> {
    const players = await this.listPlayers();
    return players.filter((player) => player.pollingEnabled);
  }

  async findPlayersByPuuids(puuids: string[]): Promise<TrackedPlayer[]> {
    const result: TrackedPlayer[] = [];
    for (const puuid of new Set(puuids)) {
      const player = this.players.get(puuid);
      if (player) result.push(structuredClone(player));
    }
    return result;
  }

  async updatePlayer(puuid: string, input: PlayerUpdateInput): Promise<TrackedPlayer> {
    const player = this.requirePlayer(puuid);
    if (input.gameName !== undefined) player.gameName = input.gameName;
    if (input.tagLine !== undefined) player.tagLine = input.tagLine;
    if (input.region !== undefined) player.region = input.region;
    if (input.pollingEnabled !== undefined) player.pollingEnabled = input.pollingEnabled;
    player.updatedAt = this.now();
    return structuredClone(player);
  }

  async removePlayer(puuid: string): Promise<void> {
    this.requirePlayer(puuid);
    this.players.delete(puuid);
    await this.resetPersonalRecords(puuid);
  }

  async markPolled(puuid: string, polledAt: Date): Promise<void> {
    const player = this.players.get(puuid);
    if (!player) return;
    player.lastPolledAt = polledAt;
  }

  async advanceCursor(puuid: string, input: CursorAdvanceInput): Promise<CursorAdvanceResult> {
    const player = this.requirePlayer(puuid);
    const current = player.lastMatchAt;
    if (current && input.matchAt.getTime() <= current.getTime()) {
      return { advanced: false, cursor: new Date(current) };
    }
    player.lastMatchAt = new Date(input.matchAt);
    player.lastMatchId = input.matchId;
    player.updatedAt = this.now();
    return { advanced: true, cursor: new Date(input.matchAt) };
  }

  async upsertMatch(record: MatchRecord): Promise<UpsertMatchResult> {
    assertValidMatch(record);
    if (this.matches.has(record.matchId)) {
      return { matchId: record.matchId, status: 'ALREADY_EXISTS' };
    }
    this.matches.set(record.matchId, structuredClone(record));
    return { matchId: record.matchId, status: 'INSERTED' };
  }

  async getMatch(matchId: string): Promise<MatchRecord | null> {
    const match = this.matches.get(matchId);
    return match ? structuredClone(match) : null;
  }

  async matchExists(matchId: string): Promise<boolean> {
    return this.matches.has(matchId);
  }

  async listParticipantSamples(query: ParticipantSampleQuery = {}): Promise<ParticipantSample[]> {
    const samples: ParticipantSample[] = [];
    for (const match of this.matches.values()) {
      for (const participant of match.participants) {
        if (query.puuid && participant.puuid !== query.puuid) continue;
        if (query.championId !== undefined && participant.championId !== query.championId) continue;
        if (query.role && participant.role !== query.role) continue;
        samples.push({
          matchId: match.matchId,
          durationSeconds: match.durationSeconds,
          stats: { ...participant },
        });
      }
    }
    return samples;
  }

  async getPersonalRecord(
    puuid: string,
    statField: string,
    kind: PersonalRecordKind
  ): Promise<PersonalRecord | null> {
    const record = this.records.get(recordKey(puuid, statField, kind));
    return record ? structuredClone(record) : null;
  }

  async setPersonalRecord(input: PersonalRecordInput): Promise<PersonalRecord> {
    assertValidRecord(input);
    const record: PersonalRecord = { ...structuredClone(input), updatedAt: this.now() };
    this.records.set(recordKey(input.puuid, input.statField, input.kind), record);
    return structuredClone(record);
  }

  async listPersonalRecords(puuid: string): Promise<PersonalRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => record.puuid === puuid)
      .sort((a, b) => a.statField.localeCompare(b.statField) || a.kind.localeCompare(b.kind))
      .map((record) => structuredClone(record));
  }

  async resetPersonalRecords(puuid: string): Promise<number> {
    let removed = 0;
    for (const [key, record] of this.records) {
      if (record.puuid === puuid) {
        this.records.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  private requirePlayer(puuid: string) {
    const player = this.players.get(puuid);
    if (!player) {
      throw new PlayerLookupError(`Player not found: ${puuid}`, { puuid });
    }
    return player;
  }
}

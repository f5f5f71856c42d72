import { setTimeout as sleep } from 'timers/promises';

import type { MatchApi, MatchTimeline } from '../api/client.js';
import { PermanentApiError, RetryableApiError } from '../api/errors.js';
import type { EventBus } from '../events/bus.js';
import type { DomainEvents } from '../events/types.js';
import { consoleLogger, describeError, type Logger } from '../logger.js';
import {
  DataIntegrityError,
  PlayerLookupError,
  formatRiotId,
  type CursorAdvanceInput,
  type MatchRecord,
  type MatchStore,
  type TrackedPlayer,
} from '../store/index.js';
import { KeyedMutex } from '../util/keyed-mutex.js';
import { mapWithConcurrency } from '../util/pool.js';
import { DEFAULT_INGESTION_FILTERS, checkIngestion, type IngestionFilterOptions } from './filters.js';

export type PollMode = 'live' | 'backfill';

export interface PlayerPollReport {
  puuid: string;
  mode: PollMode;
  status: 'completed' | 'aborted';
  matchIds: number;
  inserted: number;
  duplicates: number;
  filtered: number;
  failed: number;
  eventsPublished: number;
  cursor: Date | null;
  cursorAdvanced: boolean;
  error: string | null;
}

export interface TickReport {
  startedAt: Date;
  finishedAt: Date;
  /** True when the store was unreachable and no player was polled. */
  paused: boolean;
  players: PlayerPollReport[];
}

export interface PlayerPoller {
  pollPlayerOnce(puuid: string): Promise<PlayerPollReport>;
  backfillPlayer(puuid: string): Promise<PlayerPollReport>;
}

export interface PollingServiceOptions {
  store: MatchStore;
  api: MatchApi;
  bus: EventBus<DomainEvents>;
  intervalMs: number;
  concurrency: number;
  matchCount: number;
  filters?: IngestionFilterOptions;
  /** Fetch timelines for live polls too; backfills always fetch them. */
  liveTimelines?: boolean;
  logger?: Logger;
  now?: () => Date;
}

const LIVE_PAGE_LIMIT = 50;

const gracefulSleep = async (ms: number, signal: AbortSignal) => {
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (!(err instanceof Error && err.name === 'AbortError')) {
      throw err;
    }
  }
};

const newerOf = (current: CursorAdvanceInput | null, match: MatchRecord): CursorAdvanceInput => {
  if (current && current.matchAt.getTime() >= match.startedAt.getTime()) return current;
  return { matchAt: match.startedAt, matchId: match.matchId };
};

/**
 * Discovers new matches for tracked players on a fixed interval.
 *
 * Players are polled concurrently up to `concurrency`; a single player's cycle
 * (list ids, fetch and store each match, advance the cursor) is sequential and
 * guarded by a per-player lock shared with on-demand polls and backfills.
 */
export class PollingService implements PlayerPoller {
  private readonly store: MatchStore;
  private readonly api: MatchApi;
  private readonly bus: EventBus<DomainEvents>;
  private readonly intervalMs: number;
  private readonly concurrency: number;
  private readonly matchCount: number;
  private readonly filters: IngestionFilterOptions;
  private readonly liveTimelines: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly locks = new KeyedMutex();

  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private ticking: Promise<TickReport> | null = null;

  constructor(options: PollingServiceOptions) {
    this.store = options.store;
    this.api = options.api;
    this.bus = options.bus;
    this.intervalMs = options.intervalMs;
    this.concurrency = options.concurrency;
    this.matchCount = options.matchCount;
    this.filters = options.filters ?? DEFAULT_INGESTION_FILTERS;
    this.liveTimelines = options.liveTimelines ?? false;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? (() => new Date());
  }

  get running() {
    return this.loop !== null;
  }

  start() {
    if (this.loop) return;
    const controller = new AbortController();
    this.abort = controller;
    this.loop = this.runLoop(controller.signal);
    this.logger.info('polling_started', { intervalMs: this.intervalMs, concurrency: this.concurrency });
  }

  async stop() {
    if (!this.loop) return;
    this.abort?.abort();
    await this.loop;
    this.loop = null;
    this.abort = null;
    this.logger.info('polling_stopped', {});
  }

  /** Runs one pass over every pollable player. Overlapping calls share the pass in flight. */
  runTick(): Promise<TickReport> {
    if (!this.ticking) {
      this.ticking = this.executeTick().finally(() => {
        this.ticking = null;
      });
    }
    return this.ticking;
  }

  pollPlayerOnce(puuid: string): Promise<PlayerPollReport> {
    return this.pollExclusive(puuid, 'live');
  }

  backfillPlayer(puuid: string): Promise<PlayerPollReport> {
    return this.pollExclusive(puuid, 'backfill');
  }

  private async runLoop(signal: AbortSignal) {
    while (!signal.aborted) {
      try {
        await this.runTick();
      } catch (err) {
        this.logger.error('polling_tick_failed', describeError(err));
      }
      await gracefulSleep(this.intervalMs, signal);
    }
  }

  private async executeTick(): Promise<TickReport> {
    const startedAt = this.now();
    try {
      await this.store.ping();
    } catch (err) {
      this.logger.error('polling_paused_store_unavailable', describeError(err));
      return { startedAt, finishedAt: this.now(), paused: true, players: [] };
    }

    const players = await this.store.listPollablePlayers();
    const reports = await mapWithConcurrency(players, this.concurrency, async (player) => {
      try {
        return await this.pollExclusive(player.puuid, 'live');
      } catch (err) {
        this.logger.error('player_poll_failed', { puuid: player.puuid, error: describeError(err) });
        return this.createReport(player, 'live', 'aborted', err);
      }
    });

    const finishedAt = this.now();
    this.logger.info('polling_tick_completed', {
      players: reports.length,
      aborted: reports.filter((report) => report.status === 'aborted').length,
      inserted: reports.reduce((sum, report) => sum + report.inserted, 0),
      eventsPublished: reports.reduce((sum, report) => sum + report.eventsPublished, 0),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    });

    return { startedAt, finishedAt, paused: false, players: reports };
  }

  private pollExclusive(puuid: string, mode: PollMode): Promise<PlayerPollReport> {
    return this.locks.runExclusive(puuid, async () => {
      // Re-read under the lock so the cursor reflects any cycle that just finished.
      const player = await this.store.getPlayer(puuid);
      if (!player) {
        throw new PlayerLookupError(`Player not found: ${puuid}`, { puuid });
      }

      const report = this.createReport(player, mode, 'completed');
      try {
        await this.runCycle(player, report);
      } finally {
        await this.store.markPolled(player.puuid, this.now()).catch((err: unknown) => {
          this.logger.warn('mark_polled_failed', { puuid: player.puuid, error: describeError(err) });
        });
      }
      return report;
    });
  }

  private async runCycle(player: TrackedPlayer, report: PlayerPollReport): Promise<void> {
    let ids: string[];
    try {
      ids = report.mode === 'backfill' ? await this.api.fetchAllMatchIds(player) : await this.listNewMatchIds(player);
    } catch (err) {
      this.abortCycle(report, 'match_ids_fetch_failed', err);
      return;
    }

    report.matchIds = ids.length;
    if (!ids.length) return;

    let newest: CursorAdvanceInput | null = null;
    for (const matchId of ids) {
      let stored: MatchRecord | null;
      try {
        stored = await this.store.getMatch(matchId);
      } catch (err) {
        this.abortCycle(report, 'match_lookup_failed', err, { matchId });
        return;
      }
      if (stored) {
        report.duplicates += 1;
        newest = newerOf(newest, stored);
        continue;
      }

      let match: MatchRecord;
      try {
        match = await this.api.fetchMatch(matchId, player.region);
      } catch (err) {
        if (err instanceof PermanentApiError) {
          report.failed += 1;
          this.logger.warn('match_fetch_skipped', {
            puuid: player.puuid,
            matchId,
            reason: err.reason,
            error: describeError(err),
          });
          continue;
        }
        this.abortCycle(report, 'match_fetch_failed', err, { matchId });
        return;
      }

      const skipReason = checkIngestion(match, this.filters);
      if (skipReason) {
        report.filtered += 1;
        this.logger.debug('match_filtered', { puuid: player.puuid, matchId, reason: skipReason });
        newest = newerOf(newest, match);
        continue;
      }

      if (report.mode === 'backfill' || this.liveTimelines) {
        match.timeline = await this.fetchTimeline(player, matchId);
      }

      try {
        const { status } = await this.store.upsertMatch(match);
        if (status === 'INSERTED') {
          report.inserted += 1;
          report.eventsPublished += await this.publishNewMatch(match);
        } else {
          report.duplicates += 1;
        }
      } catch (err) {
        if (err instanceof DataIntegrityError) {
          report.failed += 1;
          this.logger.warn('match_rejected', { puuid: player.puuid, matchId, error: describeError(err) });
          continue;
        }
        this.abortCycle(report, 'match_persist_failed', err, { matchId });
        return;
      }

      newest = newerOf(newest, match);
    }

    if (!newest) return;
    if (player.lastMatchAt && newest.matchAt.getTime() <= player.lastMatchAt.getTime()) return;

    try {
      const result = await this.store.advanceCursor(player.puuid, newest);
      report.cursor = result.cursor;
      report.cursorAdvanced = result.advanced;
      if (!result.advanced) {
        this.logger.warn('cursor_advance_rejected', {
          puuid: player.puuid,
          attempted: newest.matchAt.toISOString(),
          stored: result.cursor ? result.cursor.toISOString() : null,
        });
      }
    } catch (err) {
      this.abortCycle(report, 'cursor_advance_failed', err);
    }
  }

  /**
   * Lists every id started since the cursor. Full pages are followed until a
   * short one, so a burst of games larger than `matchCount` is not left behind
   * the advanced cursor. Without a cursor only the first page is taken.
   */
  private async listNewMatchIds(player: TrackedPlayer): Promise<string[]> {
    const ids: string[] = [];
    for (let page = 0; page < LIVE_PAGE_LIMIT; page += 1) {
      const batch = await this.api.fetchMatchIds(player, {
        since: player.lastMatchAt,
        start: page * this.matchCount,
        count: this.matchCount,
      });
      ids.push(...batch);
      if (batch.length < this.matchCount || !player.lastMatchAt) break;
    }
    return ids;
  }

  /** Timelines are optional; a failure leaves the match stored without one. */
  private async fetchTimeline(player: TrackedPlayer, matchId: string): Promise<MatchTimeline | null> {
    try {
      return await this.api.fetchMatchTimeline(matchId, player.region);
    } catch (err) {
      this.logger.warn('match_timeline_unavailable', { puuid: player.puuid, matchId, error: describeError(err) });
      return null;
    }
  }

  private async publishNewMatch(match: MatchRecord): Promise<number> {
    const tracked = await this.store.findPlayersByPuuids(match.participants.map((participant) => participant.puuid));
    let published = 0;
    for (const player of tracked) {
      const participant = match.participants.find((entry) => entry.puuid === player.puuid);
      if (!participant) continue;
      await this.bus.publish('match.new', {
        puuid: player.puuid,
        playerName: formatRiotId(player),
        region: player.region,
        match,
        participant,
        publishedAt: this.now(),
      });
      published += 1;
    }
    return published;
  }

  private abortCycle(report: PlayerPollReport, event: string, err: unknown, context: Record<string, unknown> = {}) {
    report.status = 'aborted';
    report.error = err instanceof Error ? err.message : String(err);
    const payload = { puuid: report.puuid, ...context, error: describeError(err) };
    if (err instanceof RetryableApiError) {
      this.logger.warn(event, { ...payload, reason: err.reason });
    } else {
      this.logger.error(event, payload);
    }
  }

  private createReport(
    player: TrackedPlayer,
    mode: PollMode,
    status: PlayerPollReport['status'],
    err?: unknown
  ): PlayerPollReport {
    return {
      puuid: player.puuid,
      mode,
      status,
      matchIds: 0,
      inserted: 0,
      duplicates: 0,
      filtered: 0,
      failed: 0,
      eventsPublished: 0,
      cursor: player.lastMatchAt,
      cursorAdvanced: false,
      error: err === undefined ? null : err instanceof Error ? err.message : String(err),
    };
  }
}

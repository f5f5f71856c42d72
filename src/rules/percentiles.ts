import { consoleLogger, type Logger } from '../logger.js';
import type { MatchStore, ParticipantSampleQuery } from '../store/index.js';
import { extractStat, statKey, type StatSelector } from './stats.js';

export type PercentileDirection = 'high' | 'low';

const countAtMost = (sorted: readonly number[], value: number) => {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid] <= value) low = mid + 1;
    else high = mid;
  }
  return low;
};

const countBelow = (sorted: readonly number[], value: number) => {
  let low = 0;
  let high = sorted.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (sorted[mid] < value) low = mid + 1;
    else high = mid;
  }
  return low;
};

/**
 * Share (0-100) of the distribution that `value` matches or beats. For `high`
 * that is the share of values at or below it; for `low` the share at or above it.
 * Null when the distribution is empty.
 */
export const percentileRank = (
  sorted: readonly number[],
  value: number,
  direction: PercentileDirection
): number | null => {
  if (!sorted.length) return null;
  const matched = direction === 'high' ? countAtMost(sorted, value) : sorted.length - countBelow(sorted, value);
  return (matched / sorted.length) * 100;
};

export interface DistributionQuery extends StatSelector {
  /** Restricts the distribution to one player's own matches. */
  puuid?: string;
  /** Restricts the distribution to games on this champion. */
  championId?: number;
  /** Restricts the distribution to games in this role. */
  role?: string;
}

const distributionKey = (query: DistributionQuery) =>
  [query.puuid ?? '*', query.championId ?? '*', query.role || '*', statKey(query)].join('|');

const toSampleQuery = (query: DistributionQuery): ParticipantSampleQuery => ({
  ...(query.puuid ? { puuid: query.puuid } : {}),
  ...(query.championId !== undefined ? { championId: query.championId } : {}),
  ...(query.role ? { role: query.role } : {}),
});

export interface DistributionCacheOptions {
  store: MatchStore;
  /** How long a loaded distribution is served before it is rebuilt. */
  refreshIntervalMs: number;
  now?: () => number;
  logger?: Logger;
}

interface CachedDistribution {
  values: number[];
  loadedAt: number;
}

/**
 * Sorted stat distributions rebuilt from stored matches at most once per refresh
 * interval. Concurrent requests for the same distribution share one load.
 */
export class DistributionCache {
  private readonly entries = new Map<string, CachedDistribution>();
  private readonly loading = new Map<string, Promise<number[]>>();
  private readonly store: MatchStore;
  private readonly refreshIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: DistributionCacheOptions) {
    this.store = options.store;
    this.refreshIntervalMs = options.refreshIntervalMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? consoleLogger;
  }

  async get(query: DistributionQuery): Promise<number[]> {
    const key = distributionKey(query);
    const cached = this.entries.get(key);
    if (cached && this.now() - cached.loadedAt < this.refreshIntervalMs) {
      return cached.values;
    }

    const inflight = this.loading.get(key);
    if (inflight) return inflight;

    const load = this.load(key, query).finally(() => {
      this.loading.delete(key);
    });
    this.loading.set(key, load);
    return load;
  }

  invalidate() {
    this.entries.clear();
  }

  get size() {
    return this.entries.size;
  }

  private async load(key: string, query: DistributionQuery): Promise<number[]> {
    const samples = await this.store.listParticipantSamples(toSampleQuery(query));
    const values = samples
      .map((sample) => extractStat(query, sample.stats, sample.durationSeconds))
      .filter((value) => Number.isFinite(value))
      .sort((a, b) => a - b);
    this.entries.set(key, { values, loadedAt: this.now() });
    this.logger.debug('distribution_refreshed', { key, samples: values.length });
    return values;
  }
}

import type { z } from 'zod';

import type { MatchRecord, Region, TrackedPlayer } from '../store/index.js';
import { consoleLogger, describeError, type Logger } from '../logger.js';
import type { RateLimiter } from './rate-limiter.js';
import type { InvalidResponseSink } from './invalid-responses.js';
import { MalformedResponseError, PermanentApiError, RetryableApiError, type ApiErrorDetails } from './errors.js';
import {
  AccountResponseSchema,
  MatchIdsResponseSchema,
  MatchResponseSchema,
  MatchTimelineResponseSchema,
  type MatchResponse,
  type ParticipantResponse,
} from './schemas.js';

export const DEFAULT_HOST_TEMPLATE = 'https://{region}.api.riotgames.com';
export const DEFAULT_RETRY_AFTER_MS = 120_000;
export const MATCH_ID_PAGE_SIZE = 100;

export type PlayerRef = Pick<TrackedPlayer, 'puuid' | 'region'>;

export interface MatchIdQuery {
  /** Only matches started at or after this instant. */
  since?: Date | null;
  start?: number;
  count?: number;
}

export interface AccountRecord {
  puuid: string;
  gameName: string;
  tagLine: string;
}

export interface MatchApi {
  fetchMatchIds(player: PlayerRef, query?: MatchIdQuery): Promise<string[]>;
  fetchAllMatchIds(player: PlayerRef, options?: { since?: Date | null; maxPages?: number }): Promise<string[]>;
  fetchMatch(matchId: string, region: Region): Promise<MatchRecord>;
  fetchMatchTimeline(matchId: string, region: Region): Promise<MatchTimeline>;
  fetchAccountByRiotId(gameName: string, tagLine: string, region: Region): Promise<AccountRecord>;
}

export type MatchTimeline = NonNullable<MatchRecord['timeline']>;

export interface MatchApiClientOptions {
  apiKey: string;
  limiter: RateLimiter;
  hostTemplate?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  invalidResponses?: InvalidResponseSink;
  logger?: Logger;
  now?: () => number;
}

const errorName = (err: unknown) =>
  typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string' ? err.name : undefined;

const isTimeout = (err: unknown) => {
  const name = errorName(err);
  return name === 'TimeoutError' || name === 'AbortError';
};

export const parseRetryAfter = (header: string | null, now: number = Date.now()): number => {
  if (!header) return DEFAULT_RETRY_AFTER_MS;
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.ceil(Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return DEFAULT_RETRY_AFTER_MS;
  return Math.max(0, date - now);
};

const toParticipant = (participant: ParticipantResponse): MatchRecord['participants'][number] => ({
  puuid: participant.puuid,
  riotIdGameName: participant.riotIdGameName || participant.summonerName || null,
  riotIdTagline: participant.riotIdTagline || null,
  championId: participant.championId,
  championName: participant.championName,
  role: participant.teamPosition || participant.individualPosition || null,
  teamId: participant.teamId,
  win: participant.win,
  kills: participant.kills,
  deaths: participant.deaths,
  assists: participant.assists,
  totalDamageDealtToChampions: participant.totalDamageDealtToChampions,
  goldEarned: participant.goldEarned,
  visionScore: participant.visionScore,
  totalMinionsKilled: participant.totalMinionsKilled,
  timePlayedSeconds: participant.timePlayed ?? null,
});

/**
 * Maps a match-v5 payload onto the stored record. `gameDuration` is reported in
 * seconds when `gameEndTimestamp` is present and in milliseconds otherwise.
 */
export const normalizeMatch = (payload: MatchResponse): MatchRecord => {
  const { info } = payload;
  const durationSeconds =
    info.gameEndTimestamp !== undefined ? Math.round(info.gameDuration) : Math.round(info.gameDuration / 1000);

  return {
    matchId: payload.metadata.matchId,
    platformId: info.platformId,
    queueId: info.queueId,
    gameMode: info.gameMode,
    gameVersion: info.gameVersion,
    startedAt: new Date(info.gameStartTimestamp ?? info.gameCreation),
    durationSeconds,
    participants: info.participants.map(toParticipant),
    timeline: null,
    raw: payload,
  };
};

export class MatchApiClient implements MatchApi {
  private readonly apiKey: string;
  private readonly limiter: RateLimiter;
  private readonly hostTemplate: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly invalidResponses: InvalidResponseSink | null;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: MatchApiClientOptions) {
    this.apiKey = options.apiKey;
    this.limiter = options.limiter;
    this.hostTemplate = options.hostTemplate ?? DEFAULT_HOST_TEMPLATE;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.invalidResponses = options.invalidResponses ?? null;
    this.logger = options.logger ?? consoleLogger;
    this.now = options.now ?? Date.now;
  }

  async fetchMatchIds(player: PlayerRef, query: MatchIdQuery = {}): Promise<string[]> {
    const url = this.buildUrl(player.region, `/lol/match/v5/matches/by-puuid/${encodeURIComponent(player.puuid)}/ids`);
    url.searchParams.set('start', String(query.start ?? 0));
    url.searchParams.set('count', String(Math.min(Math.max(query.count ?? 20, 1), MATCH_ID_PAGE_SIZE)));
    if (query.since) {
      url.searchParams.set('startTime', String(Math.floor(query.since.getTime() / 1000)));
    }
    return this.request('match_ids', url, MatchIdsResponseSchema);
  }

  async fetchAllMatchIds(
    player: PlayerRef,
    options: { since?: Date | null; maxPages?: number } = {}
  ): Promise<string[]> {
    const maxPages = options.maxPages ?? 50;
    const ids: string[] = [];
    for (let page = 0; page < maxPages; page += 1) {
      const batch = await this.fetchMatchIds(player, {
        since: options.since,
        start: page * MATCH_ID_PAGE_SIZE,
        count: MATCH_ID_PAGE_SIZE,
      });
      ids.push(...batch);
      if (batch.length < MATCH_ID_PAGE_SIZE) break;
    }
    return ids;
  }

  async fetchMatch(matchId: string, region: Region): Promise<MatchRecord> {
    const url = this.buildUrl(region, `/lol/match/v5/matches/${encodeURIComponent(matchId)}`);
    const payload = await this.request('match', url, MatchResponseSchema);
    return normalizeMatch(payload);
  }

  async fetchMatchTimeline(matchId: string, region: Region): Promise<MatchTimeline> {
    const url = this.buildUrl(region, `/lol/match/v5/matches/${encodeURIComponent(matchId)}/timeline`);
    return this.request('match_timeline', url, MatchTimelineResponseSchema);
  }

  async fetchAccountByRiotId(gameName: string, tagLine: string, region: Region): Promise<AccountRecord> {
    const url = this.buildUrl(
      region,
      `/riot/account/v1/accounts/by-riot-id/${encodeURIComponent(gameName)}/${encodeURIComponent(tagLine)}`
    );
    const account = await this.request('account', url, AccountResponseSchema);
    return {
      puuid: account.puuid,
      gameName: account.gameName ?? gameName,
      tagLine: account.tagLine ?? tagLine,
    };
  }

  private buildUrl(region: Region, path: string) {
    return new URL(path, this.hostTemplate.replace('{region}', region));
  }

  private async request<T>(endpoint: string, url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    await this.limiter.acquire();

    const details: ApiErrorDetails = { endpoint, url: url.toString() };
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { 'X-Riot-Token': this.apiKey, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const reason = isTimeout(err) ? 'timeout' : 'network';
      this.logger.warn('riot_api_request_failed', { ...details, reason, error: describeError(err) });
      throw new RetryableApiError(`Request to ${endpoint} failed (${reason})`, reason, details, { cause: err });
    }

    const withStatus: ApiErrorDetails = { ...details, status: response.status };
    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.now());
      this.limiter.onRemoteBackoff(retryAfterMs);
      this.logger.warn('riot_api_rate_limited', { ...withStatus, retryAfterMs });
      throw new RetryableApiError(`Rate limited on ${endpoint}`, 'rate_limited', withStatus, { retryAfterMs });
    }
    if (response.status === 408 || response.status >= 500) {
      throw new RetryableApiError(`Upstream error ${response.status} on ${endpoint}`, 'server_error', withStatus);
    }
    if (response.status === 404) {
      throw new PermanentApiError(`Not found: ${url.pathname}`, 'not_found', withStatus);
    }
    if (response.status === 401 || response.status === 403) {
      this.logger.error('riot_api_unauthorized', withStatus);
      throw new PermanentApiError(`Unauthorized request to ${endpoint}`, 'unauthorized', withStatus);
    }
    if (!response.ok) {
      throw new PermanentApiError(`Request to ${endpoint} failed with status ${response.status}`, 'client_error', withStatus);
    }

    let body: unknown;
    try {
      body = await this.safeParseBody(response);
    } catch (err) {
      if (isTimeout(err)) {
        throw new RetryableApiError(`Reading ${endpoint} response timed out`, 'timeout', withStatus, { cause: err });
      }
      throw await this.malformed(withStatus, null, [`body could not be parsed: ${describeError(err).message}`]);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw await this.malformed(withStatus, body, issues);
    }
    return parsed.data;
  }

  private async malformed(details: ApiErrorDetails, body: unknown, issues: string[]) {
    const error = new MalformedResponseError(`Malformed ${details.endpoint} response`, details, body, issues);
    this.logger.warn('riot_api_malformed_response', { ...details, issues: issues.slice(0, 10) });
    if (this.invalidResponses) {
      try {
        await this.invalidResponses.record({
          endpoint: details.endpoint,
          url: details.url ?? '',
          statusCode: details.status ?? 0,
          errorMessage: error.message,
          issues,
          responseBody: body,
        });
      } catch (err) {
        this.logger.error('invalid_response_record_failed', { endpoint: details.endpoint, error: describeError(err) });
      }
    }
    return error;
  }

  private async safeParseBody(response: Response): Promise<unknown> {
    if (response.status === 204) {
      return null;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (contentType.includes('application/json')) {
      return response.json();
    }

    const text = await response.text();
    return text.length ? JSON.parse(text) : null;
  }
}

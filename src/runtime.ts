import type { Express } from 'express';

import { createApp } from './app.js';
import { createAuth } from './auth.js';
import { MatchApiClient } from './api/client.js';
import { FileInvalidResponseSink, LogInvalidResponseSink } from './api/invalid-responses.js';
import { TokenBucketRateLimiter } from './api/rate-limiter.js';
import type { AppConfig } from './config.js';
import { closePool } from './db/client.js';
import { EventBus } from './events/bus.js';
import type { DomainEvents } from './events/types.js';
import { consoleLogger, type Logger } from './logger.js';
import { LogNotifier, WebhookNotifier } from './notifications/webhook.js';
import type { Notifier } from './notifications/types.js';
import { PollingService } from './polling/service.js';
import { RuleEvaluator } from './rules/evaluator.js';
import { DistributionCache } from './rules/percentiles.js';
import type { RuleDefinition } from './rules/types.js';
import { PostgresStore, createStore, type MatchStore } from './store/index.js';

export interface RuntimeOverrides {
  store?: MatchStore;
  fetchImpl?: typeof fetch;
  notifier?: Notifier;
  logger?: Logger;
  now?: () => Date;
}

export interface Runtime {
  app: Express;
  store: MatchStore;
  bus: EventBus<DomainEvents>;
  limiter: TokenBucketRateLimiter;
  api: MatchApiClient;
  polling: PollingService;
  evaluator: RuleEvaluator;
  distributions: DistributionCache;
  start(): void;
  stop(): Promise<void>;
}

/**
 * Wires every long-lived collaborator from configuration. The rule evaluator is
 * subscribed before the poller can publish, so no event is produced without a
 * listener.
 */
export const createRuntime = (
  config: AppConfig,
  rules: readonly RuleDefinition[],
  overrides: RuntimeOverrides = {}
): Runtime => {
  const logger = overrides.logger ?? consoleLogger;
  const now = overrides.now ?? (() => new Date());
  const fetchImpl = overrides.fetchImpl ?? globalThis.fetch.bind(globalThis);

  const store = overrides.store ?? createStore({ databaseUrl: config.databaseUrl });
  const limiter = new TokenBucketRateLimiter({
    capacity: config.rateLimit.requests,
    windowMs: config.rateLimit.windowMs,
    logger,
  });
  const api = new MatchApiClient({
    apiKey: config.riot.apiKey,
    limiter,
    hostTemplate: config.riot.hostTemplate,
    timeoutMs: config.riot.timeoutMs,
    fetchImpl,
    invalidResponses: config.invalidResponsesDir
      ? new FileInvalidResponseSink(config.invalidResponsesDir, now)
      : new LogInvalidResponseSink(logger),
    logger,
  });

  const bus = new EventBus<DomainEvents>(logger);
  const distributions = new DistributionCache({
    store,
    refreshIntervalMs: config.rules.distributionRefreshMs,
    now: () => now().getTime(),
    logger,
  });
  const notifier =
    overrides.notifier ??
    (config.notifyWebhookUrl
      ? new WebhookNotifier({ url: config.notifyWebhookUrl, fetchImpl, now })
      : new LogNotifier(logger));
  const evaluator = new RuleEvaluator({ rules, store, distributions, notifier, logger });
  const detach = evaluator.attach(bus);

  const polling = new PollingService({
    store,
    api,
    bus,
    intervalMs: config.polling.intervalMs,
    concurrency: config.polling.concurrency,
    matchCount: config.polling.matchCount,
    filters: {
      allowedQueueIds: config.polling.allowedQueueIds,
      allowedGameModes: config.polling.allowedGameModes,
      minGameDurationSeconds: config.polling.minGameDurationSeconds,
    },
    liveTimelines: config.polling.liveTimelines,
    logger,
    now,
  });

  const auth = createAuth(config.auth, logger);
  const app = createApp({ store, poller: polling, accounts: api, auth });

  return {
    app,
    store,
    bus,
    limiter,
    api,
    polling,
    evaluator,
    distributions,
    start() {
      logger.info('runtime_starting', { rules: evaluator.ruleCount, authDisabled: auth.disabled });
      polling.start();
    },
    async stop() {
      await polling.stop();
      detach();
      if (store instanceof PostgresStore) {
        await closePool();
      }
      logger.info('runtime_stopped', {});
    },
  };
};

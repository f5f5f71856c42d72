import { consoleLogger, type Logger } from '../logger.js';
import type { Severity } from '../rules/types.js';
import { NotificationDeliveryError, type NotificationRequest, type Notifier } from './types.js';

const SEVERITY_COLORS: Record<Severity, number> = {
  info: 0x3498db,
  notable: 0xf1c40f,
  legendary: 0x9b59b6,
};

export interface WebhookNotifierOptions {
  url: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
  username?: string;
  now?: () => Date;
}

export const buildWebhookPayload = (request: NotificationRequest, options: { username: string; timestamp: Date }) => ({
  username: options.username,
  embeds: [
    {
      title: request.ruleName,
      description: request.message,
      color: SEVERITY_COLORS[request.severity],
      fields: [
        { name: 'Player', value: request.playerName, inline: true },
        { name: 'Match', value: request.matchId, inline: true },
      ],
      timestamp: options.timestamp.toISOString(),
    },
  ],
});

/** Posts each notification as a chat webhook embed. */
export class WebhookNotifier implements Notifier {
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;
  private readonly username: string;
  private readonly now: () => Date;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.username = options.username ?? 'match-watch';
    this.now = options.now ?? (() => new Date());
  }

  async send(request: NotificationRequest): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(buildWebhookPayload(request, { username: this.username, timestamp: this.now() })),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new NotificationDeliveryError(`Webhook responded with status ${response.status}`, response.status, body);
    }
  }
}

export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger = consoleLogger) {}

  async send(request: NotificationRequest): Promise<void> {
    this.logger.info('rule_fired', {
      ruleId: request.ruleId,
      puuid: request.puuid,
      matchId: request.matchId,
      severity: request.severity,
      message: request.message,
    });
  }
}

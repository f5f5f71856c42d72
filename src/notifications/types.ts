import type { Severity } from '../rules/types.js';

export interface NotificationRequest {
  ruleId: string;
  ruleName: string;
  puuid: string;
  playerName: string;
  matchId: string;
  message: string;
  severity: Severity;
  value: number;
}

/** Delivery collaborator for fired rules. Rejections are handled by the caller. */
export interface Notifier {
  send(request: NotificationRequest): Promise<void>;
}

export class NotificationDeliveryError extends Error {
  constructor(
    message: string,
    public readonly status: number | null,
    public readonly body: unknown = null
  ) {
    super(message);
    this.name = 'NotificationDeliveryError';
  }
}

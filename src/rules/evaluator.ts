import type { EventBus } from '../events/bus.js';
import type { DomainEvents, NewMatchEvent } from '../events/types.js';
import { consoleLogger, describeError, type Logger } from '../logger.js';
import type { Notifier, NotificationRequest } from '../notifications/types.js';
import type { MatchStore, PersonalRecordKind } from '../store/index.js';
import { KeyedMutex } from '../util/keyed-mutex.js';
import { renderMessage } from './message.js';
import { percentileRank, type DistributionCache } from './percentiles.js';
import { extractStat, statKey } from './stats.js';
import {
  compare,
  type PersonalMaxRule,
  type PersonalMinRule,
  type PlayerPercentileRule,
  type PopulationPercentileRule,
  type RuleDefinition,
} from './types.js';

export interface RuleOutcome {
  ruleId: string;
  status: 'fired' | 'not_fired' | 'error';
  value: number | null;
  previousValue: number | null;
  percentile: number | null;
  notified: boolean;
  error: string | null;
}

interface Decision {
  fired: boolean;
  previousValue: number | null;
  percentile: number | null;
}

export interface RuleEvaluatorOptions {
  rules: readonly RuleDefinition[];
  store: MatchStore;
  distributions: DistributionCache;
  notifier: Notifier;
  logger?: Logger;
}

const assertNever = (value: never): never => {
  throw new Error(`Unhandled rule kind: ${JSON.stringify(value)}`);
};

/**
 * Evaluates every configured rule against each new match event.
 *
 * Rules are isolated from one another: a rule that throws is logged and reported
 * as `error` while the rest still run. Personal records are read, compared and
 * written under a lock per (player, stat, kind), and a record written for a fired
 * rule stays written even when the notification cannot be delivered.
 */
export class RuleEvaluator {
  private readonly rules: readonly RuleDefinition[];
  private readonly store: MatchStore;
  private readonly distributions: DistributionCache;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly recordLocks = new KeyedMutex();

  constructor(options: RuleEvaluatorOptions) {
    this.rules = options.rules;
    this.store = options.store;
    this.distributions = options.distributions;
    this.notifier = options.notifier;
    this.logger = options.logger ?? consoleLogger;
  }

  get ruleCount() {
    return this.rules.length;
  }

  /** Subscribes to new-match events; the returned function unsubscribes. */
  attach(bus: EventBus<DomainEvents>): () => void {
    return bus.subscribe(
      'match.new',
      async (event) => {
        await this.evaluate(event);
      },
      { name: 'rule-evaluator' }
    );
  }

  async evaluate(event: NewMatchEvent): Promise<RuleOutcome[]> {
    const outcomes: RuleOutcome[] = [];

    for (const rule of this.rules) {
      let value: number;
      let decision: Decision;
      try {
        value = extractStat(rule, event.participant, event.match.durationSeconds);
        decision = await this.decide(rule, event, value);
      } catch (err) {
        this.logger.error('rule_evaluation_failed', {
          ruleId: rule.id,
          puuid: event.puuid,
          matchId: event.match.matchId,
          error: describeError(err),
        });
        outcomes.push({
          ruleId: rule.id,
          status: 'error',
          value: null,
          previousValue: null,
          percentile: null,
          notified: false,
          error: err instanceof Error ? err.message : String(err),
        });
        continue;
      }

      const outcome: RuleOutcome = {
        ruleId: rule.id,
        status: decision.fired ? 'fired' : 'not_fired',
        value,
        previousValue: decision.previousValue,
        percentile: decision.percentile,
        notified: false,
        error: null,
      };
      if (decision.fired) {
        outcome.notified = await this.notify(rule, event, value, decision);
      }
      outcomes.push(outcome);
    }

    this.logger.debug('rules_evaluated', {
      puuid: event.puuid,
      matchId: event.match.matchId,
      fired: outcomes.filter((outcome) => outcome.status === 'fired').map((outcome) => outcome.ruleId),
    });
    return outcomes;
  }

  private async decide(rule: RuleDefinition, event: NewMatchEvent, value: number): Promise<Decision> {
    switch (rule.kind) {
      case 'absolute':
        return { fired: compare(value, rule.operator, rule.threshold), previousValue: null, percentile: null };
      case 'personal_max':
        return this.decidePersonal(rule, 'max', event, value);
      case 'personal_min':
        if (rule.minValue !== null && value < rule.minValue) {
          return { fired: false, previousValue: null, percentile: null };
        }
        return this.decidePersonal(rule, 'min', event, value);
      case 'population_percentile':
        return this.decidePercentile(rule, event, value, false);
      case 'player_percentile':
        return this.decidePercentile(rule, event, value, true);
      default:
        return assertNever(rule);
    }
  }

  private decidePersonal(
    rule: PersonalMaxRule | PersonalMinRule,
    kind: PersonalRecordKind,
    event: NewMatchEvent,
    value: number
  ): Promise<Decision> {
    const field = statKey(rule);
    return this.recordLocks.runExclusive(`${event.puuid}:${field}:${kind}`, async () => {
      const current = await this.store.getPersonalRecord(event.puuid, field, kind);
      const improves = current === null || (kind === 'max' ? value > current.value : value < current.value);
      const previousValue = current ? current.value : null;
      if (!improves) {
        return { fired: false, previousValue, percentile: null };
      }

      await this.store.setPersonalRecord({
        puuid: event.puuid,
        statField: field,
        kind,
        value,
        matchId: event.match.matchId,
        achievedAt: event.match.startedAt,
      });
      return { fired: true, previousValue, percentile: null };
    });
  }

  /** Ranks against games on the same champion and role, optionally only the player's own. */
  private async decidePercentile(
    rule: PopulationPercentileRule | PlayerPercentileRule,
    event: NewMatchEvent,
    value: number,
    ownGamesOnly: boolean
  ): Promise<Decision> {
    const { championId, role } = event.participant;
    const distribution = await this.distributions.get({
      statField: rule.statField,
      normalizeByDuration: rule.normalizeByDuration,
      championId,
      ...(role ? { role } : {}),
      ...(ownGamesOnly ? { puuid: event.puuid } : {}),
    });
    const rank = percentileRank(distribution, value, rule.direction);
    return { fired: rank !== null && rank >= rule.percentile, previousValue: null, percentile: rank };
  }

  private async notify(rule: RuleDefinition, event: NewMatchEvent, value: number, decision: Decision) {
    const request: NotificationRequest = {
      ruleId: rule.id,
      ruleName: rule.name,
      puuid: event.puuid,
      playerName: event.playerName,
      matchId: event.match.matchId,
      severity: rule.severity,
      value,
      message: renderMessage(rule.messageTemplate, {
        playerName: event.playerName,
        ruleName: rule.name,
        value,
        previousValue: decision.previousValue,
        champion: event.participant.championName,
        percentile: decision.percentile,
      }),
    };

    try {
      await this.notifier.send(request);
      return true;
    } catch (err) {
      this.logger.error('notification_send_failed', {
        ruleId: rule.id,
        puuid: event.puuid,
        matchId: event.match.matchId,
        error: describeError(err),
      });
      return false;
    }
  }
}

import type { PercentileDirection } from './percentiles.js';
import type { StatField } from './stats.js';

export const COMPARISON_OPERATORS = ['>', '>=', '<', '<=', '==', '!='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export const SEVERITIES = ['info', 'notable', 'legendary'] as const;
export type Severity = (typeof SEVERITIES)[number];

interface RuleBase {
  id: string;
  name: string;
  statField: StatField;
  normalizeByDuration: boolean;
  severity: Severity;
  /** Placeholders: {player_name} {rule_name} {value} {previous_value} {champion} {percentile}. */
  messageTemplate: string;
}

export interface AbsoluteRule extends RuleBase {
  kind: 'absolute';
  operator: ComparisonOperator;
  threshold: number;
}

export interface PersonalMaxRule extends RuleBase {
  kind: 'personal_max';
}

export interface PersonalMinRule extends RuleBase {
  kind: 'personal_min';
  /** Observations below this value never count as a new minimum. */
  minValue: number | null;
}

export interface PopulationPercentileRule extends RuleBase {
  kind: 'population_percentile';
  percentile: number;
  direction: PercentileDirection;
}

export interface PlayerPercentileRule extends RuleBase {
  kind: 'player_percentile';
  percentile: number;
  direction: PercentileDirection;
}

export type RuleDefinition =
  | AbsoluteRule
  | PersonalMaxRule
  | PersonalMinRule
  | PopulationPercentileRule
  | PlayerPercentileRule;

export type RuleKind = RuleDefinition['kind'];

export const compare = (value: number, operator: ComparisonOperator, threshold: number): boolean => {
  switch (operator) {
    case '>':
      return value > threshold;
    case '>=':
      return value >= threshold;
    case '<':
      return value < threshold;
    case '<=':
      return value <= threshold;
    case '==':
      return value === threshold;
    case '!=':
      return value !== threshold;
  }
};

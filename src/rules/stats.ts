import type { MatchParticipantStats } from '../store/index.js';

/** Game length every per-duration value is scaled to. */
export const BASELINE_DURATION_SECONDS = 1800;

export const STAT_FIELDS = [
  'kills',
  'deaths',
  'assists',
  'kda',
  'total_minions_killed',
  'total_damage_dealt_to_champions',
  'vision_score',
  'gold_earned',
] as const;

export type StatField = (typeof STAT_FIELDS)[number];

const extractors: Record<StatField, (stats: MatchParticipantStats) => number> = {
  kills: (stats) => stats.kills,
  deaths: (stats) => stats.deaths,
  assists: (stats) => stats.assists,
  kda: (stats) => computeKda(stats),
  total_minions_killed: (stats) => stats.totalMinionsKilled,
  total_damage_dealt_to_champions: (stats) => stats.totalDamageDealtToChampions,
  vision_score: (stats) => stats.visionScore,
  gold_earned: (stats) => stats.goldEarned,
};

/** (kills + assists) / deaths, with deathless games counted as kills + assists. */
export const computeKda = (stats: Pick<MatchParticipantStats, 'kills' | 'deaths' | 'assists'>) =>
  (stats.kills + stats.assists) / Math.max(stats.deaths, 1);

export const normalizeToBaseline = (value: number, durationSeconds: number) =>
  durationSeconds > 0 ? (value / durationSeconds) * BASELINE_DURATION_SECONDS : value;

export interface StatSelector {
  statField: StatField;
  normalizeByDuration: boolean;
}

/** Ratios such as kda are already independent of game length and are never scaled. */
export const isNormalized = (selector: StatSelector) => selector.normalizeByDuration && selector.statField !== 'kda';

export const extractStat = (selector: StatSelector, stats: MatchParticipantStats, durationSeconds: number) => {
  const value = extractors[selector.statField](stats);
  return isNormalized(selector) ? normalizeToBaseline(value, durationSeconds) : value;
};

/** Storage key for records and cached distributions of a selector. */
export const statKey = (selector: StatSelector) =>
  isNormalized(selector) ? `${selector.statField}_per_${BASELINE_DURATION_SECONDS / 60}m` : selector.statField;

import type {
  MatchParticipantStats,
  MatchRecord,
  PersonalRecord,
  TrackedPlayer,
} from '../../store/index.js';
import type { PlayerPollReport } from '../../polling/service.js';

const toIso = (value: Date | null) => (value ? value.toISOString() : null);

export const toPlayerResponse = (player: TrackedPlayer) => ({
  puuid: player.puuid,
  game_name: player.gameName,
  tag_line: player.tagLine,
  region: player.region,
  polling_enabled: player.pollingEnabled,
  last_match_at: toIso(player.lastMatchAt),
  last_match_id: player.lastMatchId,
  last_polled_at: toIso(player.lastPolledAt),
  created_at: player.createdAt.toISOString(),
  updated_at: player.updatedAt.toISOString(),
});

const serializeParticipant = (participant: MatchParticipantStats) => ({
  puuid: participant.puuid,
  riot_id_game_name: participant.riotIdGameName,
  riot_id_tagline: participant.riotIdTagline,
  champion_id: participant.championId,
  champion_name: participant.championName,
  role: participant.role,
  team_id: participant.teamId,
  win: participant.win,
  kills: participant.kills,
  deaths: participant.deaths,
  assists: participant.assists,
  total_damage_dealt_to_champions: participant.totalDamageDealtToChampions,
  gold_earned: participant.goldEarned,
  vision_score: participant.visionScore,
  total_minions_killed: participant.totalMinionsKilled,
  time_played_seconds: participant.timePlayedSeconds,
});

export const toMatchResponse = (match: MatchRecord, options: { includeRaw?: boolean } = {}) => {
  const response: Record<string, unknown> = {
    match_id: match.matchId,
    platform_id: match.platformId,
    queue_id: match.queueId,
    game_mode: match.gameMode,
    game_version: match.gameVersion,
    started_at: match.startedAt.toISOString(),
    duration_seconds: match.durationSeconds,
    participants: match.participants.map(serializeParticipant),
  };

  if (options.includeRaw) {
    response.raw = match.raw;
  }

  return response;
};

export const toPersonalRecordResponse = (record: PersonalRecord) => ({
  stat_field: record.statField,
  kind: record.kind,
  value: record.value,
  match_id: record.matchId,
  achieved_at: record.achievedAt.toISOString(),
  updated_at: record.updatedAt.toISOString(),
});

export const toPollReportResponse = (report: PlayerPollReport) => ({
  puuid: report.puuid,
  mode: report.mode,
  status: report.status,
  match_ids: report.matchIds,
  inserted: report.inserted,
  duplicates: report.duplicates,
  filtered: report.filtered,
  failed: report.failed,
  events_published: report.eventsPublished,
  cursor: toIso(report.cursor),
  cursor_advanced: report.cursorAdvanced,
  error: report.error,
});

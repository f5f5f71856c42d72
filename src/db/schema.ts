import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  jsonb,
  doublePrecision,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

export const trackedPlayers = pgTable('tracked_players', {
  puuid: text('puuid').primaryKey(),
  gameName: text('game_name').notNull(),
  tagLine: text('tag_line').notNull(),
  region: text('region').notNull(),
  pollingEnabled: boolean('polling_enabled').default(true).notNull(),
  lastMatchAt: timestamp('last_match_at', { withTimezone: true }),
  lastMatchId: text('last_match_id'),
  lastPolledAt: timestamp('last_polled_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const matches = pgTable('matches', {
  matchId: text('match_id').primaryKey(),
  platformId: text('platform_id').notNull(),
  queueId: integer('queue_id').notNull(),
  gameMode: text('game_mode').notNull(),
  gameVersion: text('game_version').notNull(),
  startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
  durationSeconds: integer('duration_seconds').notNull(),
  timeline: jsonb('timeline'),
  raw: jsonb('raw'),
  ingestedAt: timestamp('ingested_at', { withTimezone: true }).defaultNow().notNull(),
});

export const matchParticipants = pgTable(
  'match_participants',
  {
    matchId: text('match_id')
      .references(() => matches.matchId, { onDelete: 'cascade' })
      .notNull(),
    participantIndex: integer('participant_index').notNull(),
    puuid: text('puuid').notNull(),
    riotIdGameName: text('riot_id_game_name'),
    riotIdTagline: text('riot_id_tagline'),
    championId: integer('champion_id').notNull(),
    championName: text('champion_name').notNull(),
    role: text('role'),
    teamId: integer('team_id').notNull(),
    win: boolean('win').notNull(),
    kills: integer('kills').notNull(),
    deaths: integer('deaths').notNull(),
    assists: integer('assists').notNull(),
    totalDamageDealtToChampions: integer('total_damage_dealt_to_champions').notNull(),
    goldEarned: integer('gold_earned').notNull(),
    visionScore: integer('vision_score').notNull(),
    totalMinionsKilled: integer('total_minions_killed').notNull(),
    timePlayedSeconds: integer('time_played_seconds'),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.matchId, table.participantIndex] }),
    puuidIdx: index('match_participants_puuid_idx').on(table.puuid),
  })
);

export const personalRecords = pgTable(
  'personal_records',
  {
    puuid: text('puuid')
      .references(() => trackedPlayers.puuid, { onDelete: 'cascade' })
      .notNull(),
    statField: text('stat_field').notNull(),
    kind: text('kind').notNull(),
    value: doublePrecision('value').notNull(),
    matchId: text('match_id').notNull(),
    achievedAt: timestamp('achieved_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.puuid, table.statField, table.kind] }),
  })
);

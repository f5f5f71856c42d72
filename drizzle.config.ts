import 'dotenv/config';
import type { Config } from 'drizzle-kit';

export default {
  schema: './src/db/schema.ts',
  out: './drizzle',
  driver: 'pg',
  dbCredentials: {
    connectionString: process.env.DATABASE_URL ?? '',
  },
  tablesFilter: ['tracked_players', 'matches', 'match_participants', 'personal_records'],
  strict: true,
} satisfies Config;

import { z } from 'zod';

export type AuthProvider = 'AUTH0' | 'DEV';

export interface AuthConfig {
  provider: AuthProvider;
  disabled: boolean;
  auth0Audience: string | null;
  auth0Domain: string | null;
  devSharedSecret: string | null;
  devAudience: string | null;
  devIssuer: string | null;
}

export interface AppConfig {
  port: number;
  databaseUrl: string | null;
  riot: {
    apiKey: string;
    hostTemplate: string;
    timeoutMs: number;
  };
  rateLimit: {
    requests: number;
    windowMs: number;
  };
  polling: {
    intervalMs: number;
    concurrency: number;
    matchCount: number;
    allowedQueueIds: number[];
    allowedGameModes: string[];
    minGameDurationSeconds: number;
    /** Also fetch timelines during live polls; backfills always fetch them. */
    liveTimelines: boolean;
  };
  rules: {
    path: string;
    distributionRefreshMs: number;
  };
  invalidResponsesDir: string | null;
  notifyWebhookUrl: string | null;
  auth: AuthConfig;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length ? value.trim() : null));

const listOf = <T extends z.ZodTypeAny>(item: T, fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean)
    )
    .pipe(z.array(item));

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .optional()
  .transform((value) => value === '1' || value === 'true');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  DATABASE_URL: optionalString,
  RIOT_API_KEY: z.string().min(1, 'RIOT_API_KEY is required'),
  RIOT_API_HOST_TEMPLATE: z.string().includes('{region}').default('https://{region}.api.riotgames.com'),
  API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(120_000),
  POLL_INTERVAL_MS: z.coerce.number().int().min(60_000, 'POLL_INTERVAL_MS must be at least 60000').default(300_000),
  POLL_CONCURRENCY: z.coerce.number().int().positive().default(4),
  POLL_MATCH_COUNT: z.coerce.number().int().min(1).max(100).default(20),
  ALLOWED_QUEUE_IDS: listOf(z.coerce.number().int().nonnegative(), '400,420,440,480'),
  ALLOWED_GAME_MODES: listOf(z.string(), 'CLASSIC'),
  MIN_GAME_DURATION_SECONDS: z.coerce.number().int().nonnegative().default(600),
  FETCH_LIVE_TIMELINES: flag,
  RULES_PATH: z.string().min(1).default('config/rules.json'),
  DISTRIBUTION_REFRESH_MS: z.coerce.number().int().positive().default(3_600_000),
  INVALID_RESPONSES_DIR: optionalString,
  NOTIFY_WEBHOOK_URL: optionalString.pipe(z.string().url().nullable()),
  AUTH_PROVIDER: z
    .string()
    .default('AUTH0')
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['AUTH0', 'DEV'])),
  AUTH0_AUDIENCE: optionalString,
  AUTH0_DOMAIN: optionalString,
  AUTH_DEV_SHARED_SECRET: optionalString,
  AUTH_DEV_AUDIENCE: optionalString,
  AUTH_DEV_ISSUER: optionalString,
  AUTH_DISABLE: flag,
});

type Env = z.infer<typeof EnvSchema>;

const toAuthConfig = (env: Env): AuthConfig => {
  const configuredAuth0 = Boolean(env.AUTH0_AUDIENCE && env.AUTH0_DOMAIN);
  const configuredDev = env.AUTH_PROVIDER === 'DEV' && Boolean(env.AUTH_DEV_SHARED_SECRET);

  return {
    provider: env.AUTH_PROVIDER,
    disabled: env.AUTH_DISABLE || (!configuredAuth0 && !configuredDev),
    auth0Audience: env.AUTH0_AUDIENCE,
    auth0Domain: env.AUTH0_DOMAIN,
    devSharedSecret: env.AUTH_DEV_SHARED_SECRET,
    devAudience: env.AUTH_DEV_AUDIENCE ?? env.AUTH0_AUDIENCE,
    devIssuer: env.AUTH_DEV_ISSUER,
  };
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${issues.length} issue(s))`, issues);
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    databaseUrl: data.DATABASE_URL,
    riot: {
      apiKey: data.RIOT_API_KEY,
      hostTemplate: data.RIOT_API_HOST_TEMPLATE,
      timeoutMs: data.API_TIMEOUT_MS,
    },
    rateLimit: {
      requests: data.RATE_LIMIT_REQUESTS,
      windowMs: data.RATE_LIMIT_WINDOW_MS,
    },
    polling: {
      intervalMs: data.POLL_INTERVAL_MS,
      concurrency: data.POLL_CONCURRENCY,
      matchCount: data.POLL_MATCH_COUNT,
      allowedQueueIds: data.ALLOWED_QUEUE_IDS,
      allowedGameModes: data.ALLOWED_GAME_MODES,
      minGameDurationSeconds: data.MIN_GAME_DURATION_SECONDS,
      liveTimelines: data.FETCH_LIVE_TIMELINES,
    },
    rules: {
      path: data.RULES_PATH,
      distributionRefreshMs: data.DISTRIBUTION_REFRESH_MS,
    },
    invalidResponsesDir: data.INVALID_RESPONSES_DIR,
    notifyWebhookUrl: data.NOTIFY_WEBHOOK_URL,
    auth: toAuthConfig(data),
  };
};

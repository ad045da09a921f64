type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function positiveIntEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export interface Config {
  REDDIT_CLIENT_ID: string;
  REDDIT_CLIENT_SECRET: string;
  REDDIT_USER_AGENT: string;
  SUBREDDIT: string;
  MONTHS_BACK: number;
  // Must cover the lookback window at the subreddit's posting rate; nothing raises it automatically.
  FETCH_LIMIT: number;
  OUTPUT_DIR: string;
  EXPORT_API_TOKEN: string;
  DRY_RUN: boolean;
}

export function loadConfig(env: Env = process.env, argv: string[] = process.argv): Config {
  return {
    // Required env vars
    REDDIT_CLIENT_ID: requireEnv(env, 'REDDIT_CLIENT_ID'),
    REDDIT_CLIENT_SECRET: requireEnv(env, 'REDDIT_CLIENT_SECRET'),

    // Optional, with defaults
    REDDIT_USER_AGENT: env.REDDIT_USER_AGENT || 'watch-listings-export/1.0',
    SUBREDDIT: env.LISTINGS_SUBREDDIT || 'watchexchange',
    MONTHS_BACK: positiveIntEnv(env, 'MONTHS_BACK', 6),
    FETCH_LIMIT: positiveIntEnv(env, 'FETCH_LIMIT', 5000),
    OUTPUT_DIR: env.OUTPUT_DIR || '.',
    EXPORT_API_TOKEN: env.EXPORT_API_TOKEN || '',

    // CLI flags
    DRY_RUN: argv.includes('--dry-run'),
  };
}

import * as dotenv from 'dotenv';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type XCredentials = {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessTokenSecret: string;
};

export type AppConfig = {
  port: number;

  // Auth for operator-only endpoints (manual run trigger)
  operatorToken: string;

  // X OAuth 1.0a user context. Never logged.
  xConsumerKey: string;
  xConsumerSecret: string;
  xAccessToken: string;
  xAccessTokenSecret: string;
  /** App-only bearer token. Accepted for completeness; posting uses the user context above. */
  xBearerToken: string;
  xVerifyOnStart: boolean;

  monthlyVerseLimit: number;
  /** When false, spacing between posts is left to the outside scheduler. */
  timeGateEnabled: boolean;
  minPostIntervalMinutes: number;

  stateFile: string;
  /** IANA timezone used to decide which calendar month "now" belongs to. */
  timezone: string;

  quranApiBase: string;
  quranSourceEdition: string;
  quranTranslationEdition: string;

  httpTimeoutMs: number;
};

function flag(v: string | undefined, fallback: boolean): boolean {
  if (v === undefined || v.trim() === '') return fallback;
  const s = v.trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes';
}

function positiveInt(v: string | undefined, fallback: number, name: string): number {
  if (v === undefined || v.trim() === '') return fallback;
  const n = Number(v);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${v}")`);
  }
  return n;
}

function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';
}

function assertTimezone(tz: string): string {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
  } catch {
    throw new ConfigError(`POST_TIMEZONE is not a valid IANA timezone: ${tz}`);
  }
  return tz;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: positiveInt(env.PORT, 8787, 'PORT'),

    operatorToken: env.OPERATOR_TOKEN || '',

    // Accept both the X_-prefixed names and the short names used by older deployments.
    xConsumerKey: env.X_CONSUMER_KEY || env.API_KEY || '',
    xConsumerSecret: env.X_CONSUMER_SECRET || env.API_SECRET || '',
    xAccessToken: env.X_ACCESS_TOKEN || env.ACCESS_TOKEN || '',
    xAccessTokenSecret: env.X_ACCESS_TOKEN_SECRET || env.ACCESS_TOKEN_SECRET || '',
    xBearerToken: env.X_BEARER_TOKEN || env.BEARER_TOKEN || '',
    xVerifyOnStart: flag(env.X_VERIFY_ON_START, false),

    monthlyVerseLimit: positiveInt(env.MONTHLY_VERSE_LIMIT, 400, 'MONTHLY_VERSE_LIMIT'),
    timeGateEnabled: flag(env.POST_TIME_GATE, true),
    minPostIntervalMinutes: positiveInt(env.MIN_POST_INTERVAL_MINUTES, 60, 'MIN_POST_INTERVAL_MINUTES'),

    stateFile: env.STATE_FILE || 'progress_state.json',
    timezone: assertTimezone((env.POST_TIMEZONE || '').trim() || systemTimezone()),

    quranApiBase: (env.QURAN_API_BASE || 'https://api.alquran.cloud/v1').replace(/\/+$/, ''),
    quranSourceEdition: env.QURAN_SOURCE_EDITION || 'quran-uthmani',
    quranTranslationEdition: env.QURAN_TRANSLATION_EDITION || 'en.sahih',

    httpTimeoutMs: positiveInt(env.HTTP_TIMEOUT_MS, 12_000, 'HTTP_TIMEOUT_MS'),
  };
}

/** Fails before any state is touched when a credential is missing. */
export function requireXCredentials(cfg: AppConfig): XCredentials {
  const missing: string[] = [];
  if (!cfg.xConsumerKey) missing.push('X_CONSUMER_KEY');
  if (!cfg.xConsumerSecret) missing.push('X_CONSUMER_SECRET');
  if (!cfg.xAccessToken) missing.push('X_ACCESS_TOKEN');
  if (!cfg.xAccessTokenSecret) missing.push('X_ACCESS_TOKEN_SECRET');
  if (missing.length) {
    throw new ConfigError(`X credentials not configured (${missing.join(', ')})`);
  }
  return {
    consumerKey: cfg.xConsumerKey,
    consumerSecret: cfg.xConsumerSecret,
    accessToken: cfg.xAccessToken,
    accessTokenSecret: cfg.xAccessTokenSecret,
  };
}

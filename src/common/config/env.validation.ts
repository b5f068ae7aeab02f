export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  FEEDBACK_DB_URL: string;
  SLACK_SIGNING_SECRET: string;
  SLACK_BOT_TOKEN: string;
  SLACK_API_BASE_URL: string;
  SLACK_API_TIMEOUT_MS: number;
  SLACK_SIGNATURE_MAX_AGE_SECONDS: number;
  FEEDBACK_TRIGGER_PHRASE: string;
  FEEDBACK_RESOLUTION_PHRASE: string;
  FEEDBACK_RATING_MIN: number;
  FEEDBACK_RATING_MAX: number;
  FEEDBACK_SESSION_TTL_MS: number;
  FEEDBACK_QUERY_LIMIT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
}

const MAX_RATING_UPPER_BOUND = 10;

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseInteger(value: unknown, fallback: number, name: string): number {
  const parsed = parseNumber(value, fallback);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer`);
  }

  return parsed;
}

function parseRequiredString(value: unknown, name: string): string {
  const resolved = String(value ?? '').trim();
  if (resolved.length === 0) {
    throw new Error(`${name} is required`);
  }

  return resolved;
}

function parsePhrase(value: unknown, fallback: string): string {
  const resolved = String(value ?? '').trim();
  return resolved.length > 0 ? resolved : fallback;
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'info' ||
    value === 'log'
  ) {
    return value;
  }

  return 'log';
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const FEEDBACK_DB_URL = parseRequiredString(config.FEEDBACK_DB_URL, 'FEEDBACK_DB_URL');
  const SLACK_SIGNING_SECRET = parseRequiredString(
    config.SLACK_SIGNING_SECRET,
    'SLACK_SIGNING_SECRET',
  );
  const SLACK_BOT_TOKEN = parseRequiredString(config.SLACK_BOT_TOKEN, 'SLACK_BOT_TOKEN');

  const FEEDBACK_RATING_MIN = parseInteger(config.FEEDBACK_RATING_MIN, 1, 'FEEDBACK_RATING_MIN');
  const FEEDBACK_RATING_MAX = parseInteger(config.FEEDBACK_RATING_MAX, 5, 'FEEDBACK_RATING_MAX');

  if (FEEDBACK_RATING_MIN < 0 || FEEDBACK_RATING_MAX > MAX_RATING_UPPER_BOUND) {
    throw new Error(
      `Feedback rating range must stay within 0..${MAX_RATING_UPPER_BOUND}`,
    );
  }

  if (FEEDBACK_RATING_MIN >= FEEDBACK_RATING_MAX) {
    throw new Error('FEEDBACK_RATING_MIN must be lower than FEEDBACK_RATING_MAX');
  }

  const SLACK_API_BASE_URL = (
    String(config.SLACK_API_BASE_URL ?? '').trim() || 'https://slack.com/api'
  ).replace(/\/+$/, '');

  return {
    NODE_ENV,
    PORT: parseNumber(config.PORT, 3000),
    FEEDBACK_DB_URL,
    SLACK_SIGNING_SECRET,
    SLACK_BOT_TOKEN,
    SLACK_API_BASE_URL,
    SLACK_API_TIMEOUT_MS: Math.max(1000, parseNumber(config.SLACK_API_TIMEOUT_MS, 5000)),
    SLACK_SIGNATURE_MAX_AGE_SECONDS: Math.max(
      1,
      parseNumber(config.SLACK_SIGNATURE_MAX_AGE_SECONDS, 300),
    ),
    FEEDBACK_TRIGGER_PHRASE: parsePhrase(config.FEEDBACK_TRIGGER_PHRASE, 'feedback please'),
    FEEDBACK_RESOLUTION_PHRASE: parsePhrase(
      config.FEEDBACK_RESOLUTION_PHRASE,
      'issue resolved',
    ),
    FEEDBACK_RATING_MIN,
    FEEDBACK_RATING_MAX,
    FEEDBACK_SESSION_TTL_MS: Math.max(
      60_000,
      parseNumber(config.FEEDBACK_SESSION_TTL_MS, 86_400_000),
    ),
    FEEDBACK_QUERY_LIMIT: Math.min(
      500,
      Math.max(1, parseInteger(config.FEEDBACK_QUERY_LIMIT, 100, 'FEEDBACK_QUERY_LIMIT')),
    ),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
  };
}

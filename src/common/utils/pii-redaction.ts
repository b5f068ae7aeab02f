import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'access_token',
  'accesstoken',
  'authorization',
  'bot_token',
  'bottoken',
  'password',
  'secret',
  'signature',
  'token',
]);

const FREE_TEXT_KEYS = new Set(['comments', 'comment', 'feedback_text', 'text']);

const REDACTED_LITERAL = '[REDACTED]';
const FREE_TEXT_PREVIEW_LENGTH = 24;

export function redactSensitiveData(value: unknown): unknown {
  const visited = new WeakSet<object>();
  return redactRecursive(value, undefined, visited);
}

function redactRecursive(
  value: unknown,
  key: string | undefined,
  visited: WeakSet<object>,
): unknown {
  const normalizedKey = key ? normalizeKey(key) : '';

  if (shouldHardRedact(normalizedKey)) {
    return REDACTED_LITERAL;
  }

  if (FREE_TEXT_KEYS.has(normalizedKey) && typeof value === 'string') {
    return truncateFreeText(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, key, visited));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactSlackTokens(redactBearerToken(value));
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  if (HARD_REDACT_KEYS.has(normalizedKey)) {
    return true;
  }

  return normalizedKey.includes('secret') || normalizedKey.includes('signature');
}

function truncateFreeText(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= FREE_TEXT_PREVIEW_LENGTH) {
    return trimmed;
  }

  return `${trimmed.slice(0, FREE_TEXT_PREVIEW_LENGTH)}...(${trimmed.length} chars)`;
}

function redactBearerToken(value: string): string {
  return value.replace(/\bBearer\s+[A-Za-z0-9\-._~+/]+=*/gi, 'Bearer [REDACTED]');
}

function redactSlackTokens(value: string): string {
  return value.replace(/\bxox[abposr]-[A-Za-z0-9-]+/g, 'xox-[REDACTED]');
}

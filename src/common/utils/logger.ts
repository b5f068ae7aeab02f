import { isRecord } from './object.utils';
import { redactSensitiveData } from './pii-redaction';

/**
 * Service logger.
 * Production writes one JSON object per line; anything else gets a colored, human-readable
 * line with an indented data block. Metadata always goes through redactSensitiveData.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogType = 'system' | 'http' | 'slack' | 'feedback' | 'security';

export interface LogMeta {
  type?: LogType;
  method?: string;
  duration?: number;
  context?: string;
  [key: string]: unknown;
}

type TypedMeta = Omit<LogMeta, 'type'>;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const TAGS: Record<LogLevel | LogType, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  http: 'HTTP',
  slack: 'SLACK',
  feedback: 'FEEDBACK',
  security: 'SECURITY',
  system: 'SYSTEM',
};

const COLORS = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  magenta: '\x1b[35m',
  bold: '\x1b[1m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  error: COLORS.red,
  warn: COLORS.yellow,
  info: COLORS.green,
  debug: COLORS.gray,
};

const TAG_WIDTH = 8;

const LOG_TYPES: readonly LogType[] = ['system', 'http', 'slack', 'feedback', 'security'];

function isLogType(value: unknown): value is LogType {
  return LOG_TYPES.some((type) => type === value);
}

function isProduction(): boolean {
  return process.env.NODE_ENV === 'production';
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? (isProduction() ? 'info' : 'debug');
  if (raw === 'log') return 'info';
  return isLogLevel(raw) ? raw : 'info';
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[currentLevel()];
}

function clockTime(): string {
  const now = new Date();
  const ms = String(now.getMilliseconds()).padStart(3, '0');
  return `${now.toTimeString().slice(0, 8)}.${ms}`;
}

function redactMeta(meta?: LogMeta): Record<string, unknown> {
  if (!meta) {
    return {};
  }

  const redacted = redactSensitiveData(meta);
  return isRecord(redacted) ? redacted : {};
}

function writeJsonLine(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown>,
  context?: string,
): void {
  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context ? { context } : {}),
    ...meta,
  });

  if (level === 'error') process.stderr.write(`${line}\n`);
  else process.stdout.write(`${line}\n`);
}

function writePrettyLine(
  level: LogLevel,
  message: string,
  meta: Record<string, unknown>,
  context?: string,
): void {
  const { type, method, ...data } = meta;
  const tag = isLogType(type) ? TAGS[type] : TAGS[level];
  const head = [
    `${COLORS.gray}${clockTime()}${COLORS.reset}`,
    `${LEVEL_COLORS[level]}${tag.padEnd(TAG_WIDTH)}${COLORS.reset}`,
    context ? `${COLORS.magenta}${context}${COLORS.reset}` : undefined,
    typeof method === 'string' ? `(${method})` : undefined,
    level === 'error' ? `${COLORS.red}${message}${COLORS.reset}` : message,
  ]
    .filter((part) => part !== undefined)
    .join(' ');

  const body =
    Object.keys(data).length > 0
      ? `\n${JSON.stringify(data, null, 2)
          .split('\n')
          .map((row) => `${COLORS.gray}  | ${COLORS.reset}${row}`)
          .join('\n')}`
      : '';

  const out = head + body;
  if (level === 'error') console.error(out);
  else if (level === 'warn') console.warn(out);
  else console.log(out);
}

function write(level: LogLevel, message: string, meta?: LogMeta, context?: string): void {
  if (!shouldLog(level)) return;

  const safeMeta = redactMeta(meta);
  if (isProduction()) {
    writeJsonLine(level, message, safeMeta, context);
    return;
  }

  writePrettyLine(level, message, safeMeta, context);
}

function formatStack(stack: string): string {
  const [first, ...frames] = stack.split('\n');
  return [
    `${COLORS.red}  ${first}${COLORS.reset}`,
    ...frames.map((frame) => `${COLORS.gray}    ${frame.trim()}${COLORS.reset}`),
  ].join('\n');
}

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, error?: Error, meta?: LogMeta) => void;
  http: (message: string, meta?: TypedMeta) => void;
  slack: (message: string, meta?: TypedMeta) => void;
  feedback: (message: string, meta?: TypedMeta) => void;
  security: (message: string, meta?: TypedMeta) => void;
  performance: (operation: string, startTime: number, meta?: Omit<TypedMeta, 'duration'>) => void;
  boot: () => void;
}

function buildLogger(context?: string): Logger {
  const at =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void =>
      write(level, message, meta, context);

  const typed =
    (level: LogLevel, type: LogType) =>
    (message: string, meta?: TypedMeta): void =>
      write(level, message, { ...meta, type }, context);

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: (message, error, meta) => {
      write(
        'error',
        message,
        { ...meta, errorName: error?.name, errorMessage: error?.message },
        context,
      );
      if (!isProduction() && error?.stack && shouldLog('error')) {
        console.error(formatStack(error.stack));
      }
    },
    http: typed('debug', 'http'),
    slack: typed('debug', 'slack'),
    feedback: typed('info', 'feedback'),
    security: typed('warn', 'security'),
    performance: (operation, startTime, meta) => {
      if (!shouldLog('debug')) return;
      write(
        'debug',
        `Performance: ${operation}`,
        { ...meta, duration: Date.now() - startTime, type: 'system' },
        context,
      );
    },
    boot: () => {
      if (isProduction()) return;
      const rule = `${COLORS.gray}${'-'.repeat(72)}${COLORS.reset}`;
      console.log(
        `${rule}\n${COLORS.green}${COLORS.bold}slack-feedback-collector starting at ${new Date().toISOString()}${COLORS.reset}\n${rule}`,
      );
    },
  };
}

export const logger: Logger = buildLogger();

export function createLogger(context: string): Logger {
  return buildLogger(context);
}

import winston from 'winston';

type LogMethod = (message: string, meta?: unknown) => void;

// The slice of winston.Logger the client uses; anything with these four methods will do
export interface Logger {
  error: LogMethod;
  warn: LogMethod;
  info: LogMethod;
  debug: LogMethod;
}

const SENSITIVE_KEY = /token|secret|password|authorization|^code$/i;

/**
 * Masks credential-bearing fields before they reach a log sink.
 * Strings keep a short prefix so two log lines can still be correlated.
 */
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (depth > 6 || value === null || typeof value !== 'object') return value;
  if (Array.isArray(value)) return value.map((item) => sanitizeForLog(item, depth + 1));

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_KEY.test(key) && typeof entry === 'string') {
      result[key] = entry.length > 8 ? `${entry.slice(0, 4)}…[redacted]` : '[redacted]';
    } else {
      result[key] = sanitizeForLog(entry, depth + 1);
    }
  }
  return result;
}

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): winston.Logger {
  return winston.createLogger({
    level,
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    defaultMeta: { service: 'teamleader-api-core' },
    // Library output goes to stderr so stdout stays clean for CLI JSON.
    transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] })],
  });
}

export const logger: Logger = createLogger();

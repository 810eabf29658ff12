/**
 * Simple structured logger for the scanner backend.
 * Строки вида: [ts] [LEVEL] [Tag] message {meta}
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function minLevel(): number {
  const raw = process.env.LOG_LEVEL?.toLowerCase() ?? '';
  return isLogLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function serializeMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) return { name: value.name, message: value.message };
    return value;
  });
}

function log(level: LogLevel, tag: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < minLevel()) return;
  const ts = new Date().toISOString();
  const metaStr = meta ? ` ${serializeMeta(meta)}` : '';
  const line = `[${ts}] [${level.toUpperCase()}] [${tag}] ${message}${metaStr}`;
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export const logger = {
  debug(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('debug', tag, msg, meta);
  },
  info(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('info', tag, msg, meta);
  },
  warn(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('warn', tag, msg, meta);
  },
  error(tag: string, msg: string, meta?: Record<string, unknown>) {
    log('error', tag, msg, meta);
  }
};

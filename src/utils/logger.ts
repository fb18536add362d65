export type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLevel(v: string): v is Level {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

let threshold: Level = (() => {
  const fromEnv = String(process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLevel(fromEnv) ? fromEnv : 'info';
})();

export function setLogLevel(level: Level): void {
  threshold = level;
}

function serialize(v: unknown): string {
  try {
    return typeof v === 'string' ? v : JSON.stringify(v);
  } catch {
    return String(v);
  }
}

export function log(level: Exclude<Level, 'silent'>, event: string, meta?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

  const base = `[ayah-poster] ${new Date().toISOString()} ${level.toUpperCase()} ${event}`;
  const line = meta && Object.keys(meta).length ? `${base} ${serialize(meta)}` : base;

  // eslint-disable-next-line no-console
  if (level === 'error') console.error(line);
  // eslint-disable-next-line no-console
  else if (level === 'warn') console.warn(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}

export const logger = {
  debug(event: string, meta?: Record<string, unknown>) {
    log('debug', event, meta);
  },
  info(event: string, meta?: Record<string, unknown>) {
    log('info', event, meta);
  },
  warn(event: string, meta?: Record<string, unknown>) {
    log('warn', event, meta);
  },
  error(event: string, meta?: Record<string, unknown>) {
    log('error', event, meta);
  },
};

// src/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
type Emitting = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ctx?: Record<string, unknown>): void;
  info(message: string, ctx?: Record<string, unknown>): void;
  warn(message: string, ctx?: Record<string, unknown>): void;
  error(message: string, ctx?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Lowest level that is written. Default: 'info' */
  level?: LogLevel;
  /** Injected for tests; defaults to process.stdout / process.stderr. */
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Injected for tests. */
  now?: () => Date;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = RANK[options.level ?? 'info'];
  const out = options.out ?? ((line: string) => process.stdout.write(line));
  const err = options.err ?? ((line: string) => process.stderr.write(line));
  const now = options.now ?? (() => new Date());

  const emit = (level: Emitting, message: string, ctx?: Record<string, unknown>) => {
    if (RANK[level] < threshold) return;
    const suffix = ctx && Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : '';
    // one grep-friendly line per record
    const line = `[${now().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}\n`;
    if (level === 'error') err(line);
    else out(line);
  };

  return {
    debug: (message, ctx) => emit('debug', message, ctx),
    info: (message, ctx) => emit('info', message, ctx),
    warn: (message, ctx) => emit('warn', message, ctx),
    error: (message, ctx) => emit('error', message, ctx),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });

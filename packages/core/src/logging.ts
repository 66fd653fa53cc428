export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmittingLevel = Exclude<LogLevel, 'silent'>;

type LogContext = Record<string, unknown>;

export interface LoggerOptions {
  readonly name?: string;
  readonly level?: LogLevel;
  readonly fields?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const WRITERS: Record<EmittingLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

class JsonLogger implements Logger {
  constructor(
    private readonly minRank: number,
    private readonly bound: LogContext,
  ) {}

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(context: LogContext): Logger {
    return new JsonLogger(this.minRank, { ...this.bound, ...context });
  }

  private write(level: EmittingLevel, message: string, context: LogContext = {}): void {
    if (LEVEL_RANK[level] < this.minRank) return;
    const entry: LogContext = { timestamp: new Date().toISOString(), level, message };
    WRITERS[level](JSON.stringify(Object.assign(entry, this.bound, context)));
  }
}

/**
 * One JSON object per line; warnings and errors go to stderr.
 * `fields` and child context are bound onto every line after the
 * timestamp, level and message.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const rank = LEVEL_RANK[options.level ?? 'info'];
  return new JsonLogger(rank, { service: options.name ?? 'riskscan', ...options.fields });
}

/** Default for services constructed without a logger */
export const silentLogger: Logger = createLogger({ level: 'silent' });

/** Message of an unknown thrown value, for log context */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

import { APP_CONFIG } from './config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Resolved per call so console spies installed after import still see output.
const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) return { error: error.message, stack: error.stack };
  return { error: String(error) };
}

/**
 * One JSON object per line. A logger carries bound context (request id,
 * endpoint, data source) that is merged under every entry it writes;
 * `child` derives a logger with more bindings.
 */
export class Logger {
  constructor(
    private readonly minLevel: LogLevel,
    private readonly bindings: LogContext = {},
  ) {}

  child(context: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.bindings, ...context });
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('error', message, context, error === undefined ? undefined : describeError(error));
  }

  private write(
    level: LogLevel,
    message: string,
    context: LogContext | undefined,
    failure?: { error: string; stack?: string },
  ): void {
    if (SEVERITY[level] < SEVERITY[this.minLevel]) return;

    const merged = { ...this.bindings, ...context };
    WRITERS[level](
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(Object.keys(merged).length > 0 ? { context: merged } : {}),
        ...failure,
      }),
    );
  }
}

const GLOBAL_LOGGER_KEY = '__forecastLogger__';

function rootLogger(): Logger {
  const g = globalThis as unknown as Record<string, Logger | undefined>;
  const existing = g[GLOBAL_LOGGER_KEY];
  if (existing) return existing;
  const created = new Logger(APP_CONFIG.logLevel, { service: 'forecast-dashboard' });
  g[GLOBAL_LOGGER_KEY] = created;
  return created;
}

export const logger = rootLogger();

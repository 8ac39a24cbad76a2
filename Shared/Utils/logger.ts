/**
 * Shared logger for the Mender services.
 *
 * Every level goes to stderr so that stdout stays free for CLI results
 * (episode summaries, JSON dumps) that callers may pipe elsewhere.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const VALID_LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.some((level) => level === value);
}

/** Line sink; defaults to console.error. */
export type LogSink = (line: string) => void;

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    if ('cause' in value && value.cause !== undefined) obj.cause = value.cause;
    return obj;
  }
  return value;
}

function levelFromEnv(): LogLevel {
  const envLevel = process.env.MENDER_LOG_LEVEL ?? process.env.LOG_LEVEL;
  return isValidLogLevel(envLevel) ? envLevel : 'info';
}

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly sink: LogSink;

  constructor(context: string = 'mender', sink?: LogSink) {
    this.context = context;
    this.level = levelFromEnv();
    this.sink = sink ?? ((line) => console.error(line));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      return `${base} ${JSON.stringify(data, errorReplacer)}`;
    }
    return base;
  }

  private emit(level: LogLevel, message: string, data?: unknown): void {
    if (this.shouldLog(level)) {
      this.sink(this.formatMessage(level, message, data));
    }
  }

  debug(message: string, data?: unknown): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.emit('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.emit('error', message, data);
  }
}

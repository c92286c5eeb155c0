/**
 * Logging infrastructure for the Orangic client.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  /** Creates a child logger with additional context. */
  child(context: Record<string, unknown>): Logger;
}

/**
 * Receives formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string) => void;

/**
 * Log configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to prefix text lines with a timestamp. */
  timestamps: boolean;
  /** Whether to output JSON lines. */
  json: boolean;
  /** Context attached to every entry. */
  context?: Record<string, unknown>;
  /** Output destination. Defaults to the console method matching the level. */
  sink?: LogSink;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: LogLevel.Info,
  timestamps: true,
  json: false,
};

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case LogLevel.Debug:
      console.debug(line);
      break;
    case LogLevel.Info:
      console.info(line);
      break;
    case LogLevel.Warn:
      console.warn(line);
      break;
    case LogLevel.Error:
      console.error(line);
      break;
  }
};

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;
  private readonly baseContext: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(config: Partial<LogConfig> = {}, baseContext: Record<string, unknown> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
    this.baseContext = { ...this.config.context, ...baseContext };
    this.sink = this.config.sink ?? consoleSink;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context, error);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context });
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: { ...this.baseContext, ...context },
      error,
    };

    this.sink(level, this.config.json ? formatJson(entry) : this.formatText(entry));
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp.toISOString(),
    ...entry.context,
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
      },
    }),
  });
}

/**
 * Logger that discards all messages.
 */
export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

/**
 * Coerces a thrown value into an Error for logging.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

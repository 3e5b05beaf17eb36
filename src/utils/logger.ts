export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export type LogMeta = Record<string, unknown>;

const SINKS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.ERROR]: (line) => console.error(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.DEBUG]: (line) => console.log(line),
};

// Children share the threshold of the logger they were made from.
interface Threshold {
  level: LogLevel;
}

export class Logger {
  private readonly threshold: Threshold;

  constructor(level: LogLevel | Threshold = LogLevel.INFO, private readonly context: LogMeta = {}) {
    this.threshold = typeof level === 'object' ? level : { level };
  }

  get level(): LogLevel {
    return this.threshold.level;
  }

  setLevel(level: LogLevel): void {
    this.threshold.level = level;
  }

  /** A logger that adds `context` to every line it writes. */
  child(context: LogMeta): Logger {
    return new Logger(this.threshold, { ...this.context, ...context });
  }

  error(message: string, meta?: LogMeta): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write(LogLevel.WARN, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write(LogLevel.INFO, message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  format(level: LogLevel, message: string, meta?: LogMeta, now = new Date()): string {
    const fields = { ...this.context, ...meta };
    const metaStr = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
    return `[${now.toISOString()}] ${LogLevel[level]}: ${message}${metaStr}`;
  }

  private write(level: LogLevel, message: string, meta?: LogMeta): void {
    if (level > this.threshold.level) return;
    SINKS[level](this.format(level, message, meta));
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toUpperCase()) {
    case 'ERROR':
      return LogLevel.ERROR;
    case 'WARN':
      return LogLevel.WARN;
    case 'INFO':
      return LogLevel.INFO;
    case 'DEBUG':
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

export function defaultLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const fromEnv = parseLogLevel(env.LOG_LEVEL);
  if (fromEnv !== undefined) return fromEnv;
  if (env.NODE_ENV === 'development') return LogLevel.DEBUG;
  if (env.NODE_ENV === 'test') return LogLevel.WARN;
  return LogLevel.INFO;
}

export const logger = new Logger(defaultLevel());

/**
 * Log levels ordered from least to most verbose.
 * Silent disables all logging output.
 */
export enum LogLevel {
  Silent,
  Fatal,
  Error,
  Warn,
  Info,
  Debug,
  Trace,
}

/**
 * Transport method a log record is written with.
 */
export enum LogDestination {
  StdOut = 'log',
  StdErr = 'error',
}

/**
 * Metadata object that can be attached to log messages.
 */
export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  /** The minimum log level to output. Defaults to Info. */
  level?: LogLevel;
  /** Object paths whose values are replaced before writing. */
  redactPaths?: string[];
  /** Where to send log output. Defaults to StdOut. */
  destination?: LogDestination;
}

/**
 * Structured logger used by providers. Records are plain objects carrying
 * the message, the level name, the bound context and the call metadata.
 */
export interface Logger {
  /**
   * Creates a child logger with additional context metadata.
   * @param context - Metadata bound to every record of the child
   */
  child(context: LogMeta): Logger;

  level: LogLevel;

  /** Unrecoverable errors */
  fatal(msg: string, meta?: LogMeta): void;
  /** Failed operations */
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  /** Flow milestones */
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace(msg: string, meta?: LogMeta): void;
}

export type LogRecord = LogMeta & { message: string; level: string };

export type LogWriter = (record: LogRecord) => void;

/**
 * Sink for log records; `console` satisfies it.
 */
export interface LogTransport {
  log: LogWriter;
  error: LogWriter;
}

import { redact } from './redaction.js';
import {
  LogDestination,
  LogLevel,
  type LogMeta,
  type LogTransport,
  type LogWriter,
  type Logger,
  type LoggerOptions,
} from './types.js';

const levelNames = new Map<string, LogLevel>(
  Object.entries(LogLevel)
    .filter((entry): entry is [string, LogLevel] => typeof entry[1] === 'number')
    .map(([name, level]) => [name.toLowerCase(), level])
);

/**
 * Parse a level name such as `debug` or `WARN`.
 * @returns The level, or `fallback` when the name is unknown or missing
 */
export function parseLogLevel(
  name: string | undefined,
  fallback: LogLevel = LogLevel.Info
): LogLevel {
  if (!name) return fallback;
  return levelNames.get(name.trim().toLowerCase()) ?? fallback;
}

export class DefaultLogger implements Logger {
  static readonly defaultLevel = LogLevel.Info;
  static readonly defaultDestination = LogDestination.StdOut;
  static readonly defaultRedactPaths: string[] = [];

  private readonly context: LogMeta;
  private readonly transport: LogTransport;
  private readonly writeRecord: LogWriter;

  public readonly destination: LogDestination;
  public redactPaths: string[];
  public level: LogLevel;

  constructor(
    context: LogMeta,
    options?: LoggerOptions,
    transport: LogTransport = console
  ) {
    this.context = context;
    this.level = options?.level ?? DefaultLogger.defaultLevel;
    this.destination = options?.destination ?? DefaultLogger.defaultDestination;
    this.redactPaths = options?.redactPaths ?? DefaultLogger.defaultRedactPaths;
    this.transport = transport;
    this.writeRecord = transport[this.destination].bind(transport);
  }

  child(context: LogMeta): Logger {
    return new DefaultLogger(
      { ...this.context, ...context },
      {
        level: this.level,
        redactPaths: this.redactPaths,
        destination: this.destination,
      },
      this.transport
    );
  }

  fatal(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Fatal, msg, meta);
  }

  error(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Error, msg, meta);
  }

  warn(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Warn, msg, meta);
  }

  info(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Info, msg, meta);
  }

  debug(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Debug, msg, meta);
  }

  trace(msg: string, meta?: LogMeta): void {
    this.log(LogLevel.Trace, msg, meta);
  }

  private log(level: LogLevel, msg: string, meta?: LogMeta): void {
    if (this.level === LogLevel.Silent || level > this.level) {
      return;
    }

    this.writeRecord({
      message: msg,
      level: LogLevel[level],
      ...redact(this.context, this.redactPaths),
      ...redact(meta ?? {}, this.redactPaths),
    });
  }
}

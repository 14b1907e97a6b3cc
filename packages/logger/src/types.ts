export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
}

export interface LogEntry {
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: string;
}

/** Receives one serialized log entry per call */
export type LogSink = (line: string) => void;

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  debug(event_type: string, metadata?: Record<string, unknown>): void;

  info(event_type: string, metadata?: Record<string, unknown>): void;

  warn(event_type: string, metadata?: Record<string, unknown>): void;

  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Write out any buffered entries
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  environment?: Environment;
  /** Overrides the environment's minimum level */
  minLevel?: LogLevel;
  /** Where serialized entries go (default console.log) */
  sink?: LogSink;
  /** Entries held before an automatic flush (default 1, i.e. unbuffered) */
  bufferSize?: number;
}

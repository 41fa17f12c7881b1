export type LogLevel = "info" | "warn" | "error";

export interface LogRecord {
  level: LogLevel;
  /** One flattened line */
  message: string;
  /** Module the record is attributed to */
  module?: string;
  /** Script stack trace, when one was captured */
  trace?: string;
}

/**
 * Sink port interface.
 * Receives every line the sandbox and its scripts log.
 */
export interface LogSink {
  write(record: LogRecord): void;
}

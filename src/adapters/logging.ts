import type { LogRecord, LogSink } from "../ports/sink";

/**
 * Log sink that prints to the console, tagging each line with the module it
 * came from.
 */
export function consoleSink(prefix = "modbox"): LogSink {
  return {
    write(record: LogRecord): void {
      const tag = record.module ? `[${prefix}:${record.module}]` : `[${prefix}]`;
      const line = `${tag} ${record.message}`;
      switch (record.level) {
        case "info":
          console.log(line);
          break;
        case "warn":
          console.warn(line);
          break;
        case "error":
          console.error(record.trace ? `${line}\n${record.trace}` : line);
          break;
      }
    },
  };
}

export type MemorySink = LogSink & { readonly records: LogRecord[] };

/**
 * Log sink that keeps every record in memory.
 */
export function memorySink(records: LogRecord[] = []): MemorySink {
  return {
    records,
    write(record: LogRecord): void {
      records.push(record);
    },
  };
}

/**
 * Forward every record to several sinks.
 */
export function teeSink(...sinks: LogSink[]): LogSink {
  return {
    write(record: LogRecord): void {
      for (const sink of sinks) sink.write(record);
    },
  };
}

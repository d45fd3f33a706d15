export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  time: number; // Date.now() when the record was pushed
  level: LogLevel;
  source: string; // e.g. "cpu", "daemon"
  message: string;
}

export const DEFAULT_LOG_CAPACITY = 256;

export type LogSink = (record: LogRecord) => void;

/**
 * Bounded channel of log records. The execution loop pushes, a front end
 * drains; when full the oldest record is dropped.
 *
 * With a sink, records are handed over instead of kept or echoed. The
 * execution thread uses this to ship its records to the daemon's log.
 */
export class DiagnosticsLog {
  private records: LogRecord[] = [];
  private dropped: number = 0;
  private trace: boolean = false; // Echo records to the console

  constructor(
    private capacity: number = DEFAULT_LOG_CAPACITY,
    private sink: LogSink | null = null,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Invalid log capacity: ${capacity}`);
    }
  }

  setTrace(enabled: boolean) {
    this.trace = enabled;
  }

  isTracing(): boolean {
    return this.trace;
  }

  push(level: LogLevel, source: string, message: string): void {
    this.append({ time: Date.now(), level, source, message });
  }

  append(record: LogRecord): void {
    if (this.sink) {
      this.sink(record);
      return;
    }

    if (this.records.length >= this.capacity) {
      this.records.shift();
      this.dropped++;
    }
    this.records.push(record);

    if (this.trace) {
      const line = `[${record.source}] ${record.message}`;
      if (record.level === "error" || record.level === "warn") {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  debug(source: string, message: string) {
    this.push("debug", source, message);
  }

  info(source: string, message: string) {
    this.push("info", source, message);
  }

  warn(source: string, message: string) {
    this.push("warn", source, message);
  }

  error(source: string, message: string) {
    this.push("error", source, message);
  }

  /**
   * Remove and return every pending record, oldest first.
   */
  drain(): LogRecord[] {
    const out = this.records;
    this.records = [];
    return out;
  }

  size(): number {
    return this.records.length;
  }

  getDroppedCount(): number {
    return this.dropped;
  }
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Threshold accepted by the logger; `silent` drops every entry. */
export type LogThreshold = LogLevel | "silent";

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `debug`. */
  readonly minLevel?: LogThreshold;
  /** Receives every serialised line. Defaults to writing on stdout. */
  readonly sink?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
  /** Clock used to stamp entries, injectable for tests. */
  readonly now?: () => Date;
}

/**
 * Structured logger that emits one JSON object per line. Algorithms accept an
 * optional instance and stay silent when none is provided.
 */
export class StructuredLogger {
  private readonly minRank: number;
  private readonly sink: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.minRank = LEVEL_RANK[options.minLevel ?? "debug"];
    this.sink = options.sink ?? ((line) => process.stdout.write(line));
    this.entryListener = options.onEntry;
    this.now = options.now ?? (() => new Date());
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  /** Whether an entry at {@link level} would be emitted. */
  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minRank;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    this.sink(`${JSON.stringify(entry)}\n`);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
  }
}

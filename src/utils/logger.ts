// src/utils/logger.ts
//
// Lox Logger
// ----------
// Leveled logging for tooling diagnostics:
// - lsp/server.ts routes it to the LSP connection console
// - runner/run.ts times its stages at debug level
//
// Program output and error reports never go through here; they have their own
// channels (HostServices.print and the ErrorReporter sink).
//
//   const log = createLogger({ name: "lox", level: "info" });
//   log.info("analyzed", { tokens: 12 });   // "<ts> [lox] INFO: analyzed {"tokens":12}"
//   const t = log.time("parse"); ... t.end();

/* =========================================================
   Levels
   ========================================================= */

// higher rank = more verbose; a message passes when its rank <= the logger's
const LEVEL_RANK = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
} as const;

export type LogLevel = keyof typeof LEVEL_RANK;

type MessageLevel = Exclude<LogLevel, "silent">;

export function isLogLevel(x: unknown): x is LogLevel {
  return typeof x === "string" && Object.prototype.hasOwnProperty.call(LEVEL_RANK, x);
}

/* =========================================================
   Sink
   ========================================================= */

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

// trace shares the debug channel
const CHANNEL: Record<MessageLevel, keyof LogSink> = {
  error: "error",
  warn: "warn",
  info: "info",
  debug: "debug",
  trace: "debug",
};

const consoleSink: LogSink = {
  error: (msg) => console.error(msg),
  warn: (msg) => console.warn(msg),
  info: (msg) => console.log(msg),
  debug: (msg) => console.debug(msg),
};

/* =========================================================
   Logger
   ========================================================= */

export type LoggerOptions = {
  name?: string;
  level?: LogLevel;
  sink?: LogSink;
  /** Prefix each line with an ISO timestamp (default true). */
  timestamp?: boolean;
};

export type Timer = {
  /** Logs the elapsed time at debug level and returns it in ms. */
  end: (payload?: unknown) => number;
};

export class Logger {
  private level: LogLevel;
  private readonly seen = new Set<string>();

  constructor(private readonly options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public error(msg: string, payload?: unknown): void {
    this.write("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.write("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.write("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.write("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.write("trace", msg, payload);
  }

  /** Writes the message the first time `key` is seen; later calls are dropped. */
  public logOnce(level: MessageLevel, key: string, msg: string, payload?: unknown): void {
    if (this.seen.has(key)) return;
    this.seen.add(key);
    this.write(level, msg, payload);
  }

  public time(label: string): Timer {
    const startedAt = performance.now();
    this.trace(`start ${label}`);

    return {
      end: (payload) => {
        const elapsed = performance.now() - startedAt;
        this.debug(`${label} took ${elapsed.toFixed(2)}ms`, payload);
        return elapsed;
      },
    };
  }

  private write(level: MessageLevel, msg: string, payload: unknown): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) return;

    const parts: string[] = [];
    if (this.options.timestamp ?? true) parts.push(isoSeconds(new Date()));
    parts.push(`[${this.options.name ?? "lox"}]`, `${level.toUpperCase()}:`, msg);
    if (payload !== undefined) parts.push(renderPayload(payload));

    const sink = this.options.sink ?? consoleSink;
    sink[CHANNEL[level]](parts.join(" "));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/* =========================================================
   Formatting
   ========================================================= */

function renderPayload(value: unknown): string {
  try {
    const json: string | undefined = JSON.stringify(value);
    return json === undefined ? String(value) : json;
  } catch {
    return "[unserializable]";
  }
}

function isoSeconds(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}

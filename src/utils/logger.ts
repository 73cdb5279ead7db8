/**
 * Dual-channel logger for the devstack engine.
 *
 * Every entry goes to the durable sink (a log file). Entries at or above the
 * minimum level that are not subprocess noise also go to the user sink,
 * optionally rewritten into shorter phrasing. Writes are synchronous, so the
 * entry ring and the progress line cannot be torn by concurrent stream
 * readers.
 */

import fs from "fs";
import path from "path";
import {
  CLEAR_LINE,
  ICONS,
  getDateTime,
  getTimestamp,
  painter,
  type Painter,
} from "./terminal";

export type LogLevel = "debug" | "info" | "warning" | "error" | "progress";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3,
  progress: 4,
};

export type LogEntry = Readonly<{
  timestamp: string;
  level: LogLevel;
  message: string;
  source: string;
  userVisible: boolean;
}>;

/** Anything with a write(); fs.WriteStream and process.stdout both fit */
export type LogSink = {
  write(chunk: string): unknown;
  on?(event: "error", listener: (err: Error) => void): unknown;
};

export type TransformRule = Readonly<{ pattern: RegExp; template: string }>;

// Subprocess chatter nobody needs to see
export const NOISE_PATTERNS: readonly RegExp[] = [
  /^[a-f0-9]+: (Pulling|Waiting|Downloading|Extracting|Verifying|Pull complete|Already exists)/,
  /^[a-f0-9]{12}$/,
  /^[a-f0-9]{64}$/,
  /^Digest: sha256:/,
  /^Status: Downloaded/,
  /^Status: Image is up to date/,
  /^(Creating|Created) network/,
  /^(Creating|Created) volume/,
  /^\s*(✔\s+)?Network \S+\s+(Creating|Created)$/,
  /^\s*(✔\s+)?Volume "?\S+"?\s+(Creating|Created)$/,
  /^Container [a-f0-9]+ Creating$/,
  /^\s*$/,
];

// Applied in order; first match wins
export const TRANSFORM_RULES: readonly TransformRule[] = [
  { pattern: /Pulling from (.+)/, template: "Downloading image: $1" },
  { pattern: /Container (\S+)\s+Started/, template: "Started: $1" },
  { pattern: /Container (\S+)\s+Stopped/, template: "Stopped: $1" },
  { pattern: /Container (\S+)\s+Running/, template: "Running: $1" },
];

export type LoggerOptions = {
  fileSink?: LogSink | null;
  userSink?: LogSink | null;
  minLevel?: LogLevel;
  verbose?: boolean;
  maxEntries?: number;
  color?: boolean;
  noisePatterns?: readonly RegExp[];
  transformRules?: readonly TransformRule[];
  now?: () => Date;
};

export class Logger {
  private readonly fileSink: LogSink | null;
  private readonly userSink: LogSink | null;
  private readonly paint: Painter;
  private readonly now: () => Date;
  private readonly maxEntries: number;
  private readonly noisePatterns: readonly RegExp[];
  private readonly transformRules: readonly TransformRule[];

  private minLevel: LogLevel;
  private noiseFilter = true;
  private userFriendly = true;
  private entries: LogEntry[] = [];
  private progressLine = "";
  private progressOnScreen = false;
  private failedWrites = 0;

  constructor(options: LoggerOptions = {}) {
    this.fileSink = options.fileSink ?? null;
    this.userSink = options.userSink ?? null;
    this.paint = painter(options.color ?? false);
    this.now = options.now ?? (() => new Date());
    this.maxEntries = options.maxEntries ?? 1000;
    this.noisePatterns = options.noisePatterns ?? NOISE_PATTERNS;
    this.transformRules = options.transformRules ?? TRANSFORM_RULES;
    this.minLevel = options.minLevel ?? "info";

    for (const sink of [this.fileSink, this.userSink]) {
      sink?.on?.("error", () => {
        this.failedWrites++;
      });
    }

    if (options.verbose) this.setVerbose(true);
  }

  /** Verbose: everything, untransformed, unfiltered */
  setVerbose(verbose: boolean): void {
    this.minLevel = verbose ? "debug" : "info";
    this.noiseFilter = !verbose;
    this.userFriendly = !verbose;
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /** Number of sink writes that failed; logging never throws */
  get sinkFailures(): number {
    return this.failedWrites;
  }

  log(level: LogLevel, source: string, message: string): void {
    const date = this.now();
    const entry: LogEntry = {
      timestamp: date.toISOString(),
      level,
      message,
      source,
      userVisible:
        LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel] &&
        !(this.noiseFilter && this.isNoise(message)),
    };

    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    this.write(
      this.fileSink,
      `[${getDateTime(date)}] [${level.toUpperCase()}] [${source}] ${message}\n`,
    );

    if (entry.userVisible && this.userSink) {
      const text = this.userFriendly ? this.transform(message) : message;
      this.writeUser(level, text, date);
    }
  }

  debug(source: string, message: string): void {
    this.log("debug", source, message);
  }

  info(source: string, message: string): void {
    this.log("info", source, message);
  }

  warning(source: string, message: string): void {
    this.log("warning", source, message);
  }

  error(source: string, message: string): void {
    this.log("error", source, message);
  }

  /** Redraw the single transient status line */
  progress(source: string, message: string): void {
    this.progressLine = message;
    this.log("progress", source, message);
  }

  /** Terminate the transient line and return to line-based output */
  progressDone(): void {
    if (!this.progressLine) return;
    if (this.progressOnScreen) {
      this.write(this.userSink, "\n");
    }
    this.progressLine = "";
    this.progressOnScreen = false;
  }

  get activeProgress(): string {
    return this.progressLine;
  }

  getEntries(minLevel: LogLevel = "debug"): LogEntry[] {
    return this.entries.filter(
      (entry) => LEVEL_RANK[entry.level] >= LEVEL_RANK[minLevel],
    );
  }

  getUserEntries(): LogEntry[] {
    return this.entries.filter((entry) => entry.userVisible);
  }

  isNoise(message: string): boolean {
    return this.noisePatterns.some((pattern) => pattern.test(message));
  }

  transform(message: string): string {
    for (const rule of this.transformRules) {
      if (rule.pattern.test(message)) {
        return message.replace(rule.pattern, rule.template);
      }
    }
    return message;
  }

  private writeUser(level: LogLevel, text: string, date: Date): void {
    const { c } = this.paint;
    const stamp = c("dim", `[${getTimestamp(date)}]`);

    if (level === "progress") {
      this.write(this.userSink, `${CLEAR_LINE}${stamp} ${c("gray", text)}`);
      this.progressOnScreen = true;
      return;
    }

    let line: string;
    switch (level) {
      case "error":
        line = `${stamp} ${c("red", ICONS.failure)} ${c("white", text)}`;
        break;
      case "warning":
        line = `${stamp} ${c("yellow", ICONS.warning)} ${c("white", text)}`;
        break;
      case "info":
        line = `${stamp} ${c("gray", text)}`;
        break;
      case "debug":
        line = `${stamp} ${c("dim", text)}`;
        break;
    }

    // A normal line replaces whatever transient line is on screen
    const prefix = this.progressOnScreen ? CLEAR_LINE : "";
    this.progressOnScreen = false;
    this.write(this.userSink, `${prefix}${line}\n`);
  }

  private write(sink: LogSink | null, chunk: string): void {
    if (!sink) return;
    try {
      sink.write(chunk);
    } catch {
      this.failedWrites++;
    }
  }
}

/**
 * Open (or create) an append-only log file, creating its directory first.
 */
export function createLogFile(filePath: string): fs.WriteStream {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  return fs.createWriteStream(filePath, { flags: "a", mode: 0o644 });
}

/** In-memory sink for tests and for capturing output */
export class MemorySink implements LogSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }

  /** Complete lines written so far */
  get lines(): string[] {
    return this.text.split("\n").filter((line) => line.length > 0);
  }
}

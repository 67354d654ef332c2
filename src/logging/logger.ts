/**
 * WhosOn Logging
 *
 * Structured subsystem logging with log levels, per-target context, redaction
 * and pluggable transports (console, file, in-memory capture).
 */

import { createWriteStream, type WriteStream } from "node:fs";

// =============================================================================
// Logger Types
// =============================================================================

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type TrackerLogLevel = (typeof LOG_LEVELS)[number];

export type TrackerLogEntry = {
  timestamp: Date;
  level: TrackerLogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  scopeId?: string;
  targetKey?: string;
  operation?: string;
};

export type LogFormatter = (entry: TrackerLogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: TrackerLogEntry): void;
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

export type LogContext = {
  scopeId?: string;
  targetKey?: string;
  operation?: string;
};

export interface TrackerLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): TrackerLogger;
  withContext(context: LogContext): TrackerLogger;
  setLevel(level: TrackerLogLevel): void;
  getLevel(): TrackerLogLevel;
  isLevelEnabled(level: TrackerLogLevel): boolean;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<TrackerLogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: TrackerLogLevel, minLevel: TrackerLogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is TrackerLogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

// =============================================================================
// Default Log Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<TrackerLogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: {
  colors?: boolean;
  timestamps?: boolean;
  includeMetadata?: boolean;
}): LogFormatter {
  const {
    colors = process.stdout.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: TrackerLogEntry): string => {
    const parts: string[] = [];

    if (timestamps) {
      const ts = entry.timestamp.toISOString();
      parts.push(colors ? `${COLORS.dim}${ts}${COLORS.reset}` : ts);
    }

    const levelStr = entry.level.toUpperCase().padEnd(5);
    parts.push(colors ? `${LEVEL_COLORS[entry.level]}${levelStr}${COLORS.reset}` : levelStr);
    parts.push(colors ? `${COLORS.blue}[${entry.subsystem}]${COLORS.reset}` : `[${entry.subsystem}]`);
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.scopeId) contextParts.push(`scope=${entry.scopeId}`);
    if (entry.targetKey) contextParts.push(`target=${entry.targetKey}`);
    if (entry.operation) contextParts.push(`op=${entry.operation}`);
    if (contextParts.length > 0) {
      const ctx = contextParts.join(" ");
      parts.push(colors ? `${COLORS.dim}(${ctx})${COLORS.reset}` : `(${ctx})`);
    }

    if (includeMetadata && entry.metadata && Object.keys(entry.metadata).length > 0) {
      const metaStr = JSON.stringify(entry.metadata);
      parts.push(colors ? `${COLORS.dim}${metaStr}${COLORS.reset}` : metaStr);
    }

    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: TrackerLogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: TrackerLogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "info";
  }

  write(entry: TrackerLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    const formatted = this.formatter(entry);
    if (entry.level === "error" || entry.level === "fatal") {
      console.error(formatted);
    } else if (entry.level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }
}

/** Append-only file transport with a small write buffer. */
export class FileTransport implements LogTransport {
  name = "file";
  private formatter: LogFormatter;
  private minLevel: TrackerLogLevel;
  private buffer: string[] = [];
  private bufferSize: number;
  private filePath: string;
  private writeStream: WriteStream | null = null;

  constructor(options: {
    filePath: string;
    formatter?: LogFormatter;
    minLevel?: TrackerLogLevel;
    bufferSize?: number;
  }) {
    this.filePath = options.filePath;
    this.formatter = options.formatter ?? createDefaultFormatter({ colors: false });
    this.minLevel = options.minLevel ?? "info";
    this.bufferSize = options.bufferSize ?? 20;
  }

  write(entry: TrackerLogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;

    this.buffer.push(this.formatter(entry));
    if (this.buffer.length >= this.bufferSize || entry.level === "fatal") {
      this.flushSync();
    }
  }

  async flush(): Promise<void> {
    this.flushSync();
  }

  async close(): Promise<void> {
    this.flushSync();
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return;
    await new Promise<void>((resolve) => stream.end(resolve));
  }

  private flushSync(): void {
    if (this.buffer.length === 0) return;
    if (!this.writeStream) {
      this.writeStream = createWriteStream(this.filePath, { flags: "a" });
    }
    this.writeStream.write(this.buffer.join("\n") + "\n");
    this.buffer = [];
  }
}

/** Captures entries in memory. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: TrackerLogEntry[] = [];

  write(entry: TrackerLogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: TrackerLogLevel): string[] {
    return this.entries.filter((e) => !level || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class TrackerLoggerImpl implements TrackerLogger {
  readonly subsystem: string;
  private level: TrackerLogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: TrackerLogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): TrackerLogger {
    return new TrackerLoggerImpl({
      subsystem: `${this.subsystem}/${name}`,
      level: this.level,
      transports: this.transports,
      context: this.context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  withContext(context: LogContext): TrackerLogger {
    return new TrackerLoggerImpl({
      subsystem: this.subsystem,
      level: this.level,
      transports: this.transports,
      context: { ...this.context, ...context },
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  setLevel(level: TrackerLogLevel): void {
    this.level = level;
  }

  getLevel(): TrackerLogLevel {
    return this.level;
  }

  isLevelEnabled(level: TrackerLogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private log(level: TrackerLogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const entry: TrackerLogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      metadata: meta ? this.redactObject(meta) : undefined,
      scopeId: this.context.scopeId,
      targetKey: this.context.targetKey,
      operation: this.context.operation,
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(`log transport "${transport.name}" failed: ${String(err)}\n`);
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (value instanceof Error) {
        result[key] = this.redact(value.message);
      } else if (typeof value === "object" && value !== null && !Array.isArray(value)) {
        result[key] = this.redactObject(Object.fromEntries(Object.entries(value)));
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

/** Discord bot tokens. */
export const DEFAULT_REDACT_PATTERNS = ["[MN][A-Za-z\\d_-]{23,25}\\.[\\w-]{6}\\.[\\w-]{27,38}"];

export type LoggingOptions = {
  level?: TrackerLogLevel;
  transports?: LogTransport[];
  redactPatterns?: string[];
};

/** Root logger for the `whoson` subsystem tree. */
export function createTrackerLogger(subsystem: string, options?: LoggingOptions): TrackerLogger {
  const level = options?.level ?? "info";
  const transports = options?.transports ?? [new ConsoleTransport({ minLevel: level })];

  return new TrackerLoggerImpl({
    subsystem: `whoson/${subsystem}`,
    level,
    transports,
    redactPatterns: options?.redactPatterns ?? DEFAULT_REDACT_PATTERNS,
  });
}

/** Logger that captures everything in memory. */
export function createCapturingLogger(subsystem = "test"): { logger: TrackerLogger; transport: MemoryTransport } {
  const transport = new MemoryTransport();
  const logger = createTrackerLogger(subsystem, { level: "trace", transports: [transport] });
  return { logger, transport };
}

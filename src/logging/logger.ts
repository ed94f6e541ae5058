/**
 * stratum — Logging Subsystem
 *
 * Structured subsystem logging with log levels, pluggable transports and
 * redaction of sensitive values before anything reaches a transport.
 */

import { Redactor } from "./redact.js";

// =============================================================================
// Logger Types
// =============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  deployment?: string;
  template?: string;
  node?: string;
  duration?: number;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export type LogContext = {
  deployment?: string;
  template?: string;
  node?: string;
};

export interface Logger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): Logger;
  withContext(context: LogContext): Logger;
  /** A logger that additionally hides the given redactor's secrets. */
  withRedactor(redactor: Redactor): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LoggingConfig = {
  level?: LogLevel;
  colors?: boolean;
  sensitiveFields?: readonly string[];
  redactPatterns?: readonly string[];
};

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function compareLogLevels(a: LogLevel, b: LogLevel): -1 | 0 | 1 {
  const pa = LOG_LEVEL_PRIORITY[a];
  const pb = LOG_LEVEL_PRIORITY[b];
  if (pa < pb) return -1;
  if (pa > pb) return 1;
  return 0;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
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

const LEVEL_COLORS: Record<LogLevel, string> = {
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
    colors = process.stderr.isTTY ?? false,
    timestamps = true,
    includeMetadata = true,
  } = options ?? {};

  return (entry: LogEntry): string => {
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
    if (entry.deployment) contextParts.push(`deployment=${entry.deployment}`);
    if (entry.template) contextParts.push(`template=${entry.template}`);
    if (entry.node) contextParts.push(`node=${entry.node}`);
    if (entry.duration !== undefined) contextParts.push(`duration=${entry.duration}ms`);

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

/**
 * Writes to stderr so command output on stdout stays machine-readable.
 */
export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;
  private minLevel: LogLevel;

  constructor(options?: { formatter?: LogFormatter; minLevel?: LogLevel }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
    this.minLevel = options?.minLevel ?? "info";
  }

  write(entry: LogEntry): void {
    if (!shouldLog(entry.level, this.minLevel)) return;
    console.error(this.formatter(entry));
  }
}

/** Keeps entries in memory; used by tests and by callers that render logs themselves. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(): string[] {
    return this.entries.map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class StratumLogger implements Logger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactors: Redactor[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactors?: Redactor[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactors = options.redactors ?? [new Redactor()];
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

  child(name: string): Logger {
    return this.derive({ subsystem: `${this.subsystem}/${name}` });
  }

  withContext(context: LogContext): Logger {
    return this.derive({ context: { ...this.context, ...context } });
  }

  withRedactor(redactor: Redactor): Logger {
    return this.derive({ redactors: [...this.redactors, redactor] });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private derive(overrides: { subsystem?: string; context?: LogContext; redactors?: Redactor[] }): StratumLogger {
    return new StratumLogger({
      subsystem: overrides.subsystem ?? this.subsystem,
      level: this.level,
      transports: this.transports,
      context: overrides.context ?? this.context,
      redactors: overrides.redactors ?? this.redactors,
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    let text = message;
    let metadata = meta;
    for (const redactor of this.redactors) {
      text = redactor.redactText(text);
      if (metadata) metadata = redactor.redactRecord(metadata);
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: text,
      metadata,
      deployment: this.context.deployment,
      template: this.context.template,
      node: this.context.node,
    };

    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

// =============================================================================
// Logger Factory
// =============================================================================

export function createLogger(subsystem: string, config?: LoggingConfig, transports?: LogTransport[]): Logger {
  const level = config?.level ?? "info";
  return new StratumLogger({
    subsystem: `stratum/${subsystem}`,
    level,
    transports: transports ?? [
      new ConsoleTransport({ minLevel: level, formatter: createDefaultFormatter({ colors: config?.colors }) }),
    ],
    redactors: [new Redactor({ sensitiveFields: config?.sensitiveFields, patterns: config?.redactPatterns })],
  });
}

let globalLogger: Logger | null = null;

/**
 * Get or create the process-wide logger, optionally scoped to a subsystem.
 */
export function getLogger(subsystem?: string): Logger {
  if (!globalLogger) {
    globalLogger = createLogger("core");
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setLogger(logger: Logger | null): void {
  globalLogger = logger;
}

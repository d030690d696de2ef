export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export type LogFields = Record<string, unknown>;

/** Receives finished log lines, without a trailing newline. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Scope shown in brackets, e.g. `agent-runtime:customer_service` */
  prefix?: string;
  /** Defaults to stderr so chat output on stdout stays clean */
  sink?: LogSink;
  /** Fields added to every line */
  bindings?: LogFields;
  now?: () => Date;
}

export interface Logger {
  readonly level: LogLevel;
  isEnabled(level: LogLevel): boolean;
  /** Same sink and level, with `:scope` appended to the prefix */
  child(scope: string, bindings?: LogFields): Logger;
  /** Same scope, with extra fields on every line */
  with(bindings: LogFields): Logger;
  error(event: string, fields?: LogFields): void;
  warn(event: string, fields?: LogFields): void;
  info(event: string, fields?: LogFields): void;
  debug(event: string, fields?: LogFields): void;
  trace(event: string, fields?: LogFields): void;
}

interface ResolvedOptions {
  level: LogLevel;
  prefix: string;
  sink: LogSink;
  bindings: LogFields;
  now: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const REDACTED_KEYS = /^(password|token|secret|api_?key|authorization)$/i;
const MAX_VALUE_LENGTH = 300;

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function createLogger(options: LoggerOptions = {}): Logger {
  return buildLogger({
    level: options.level ?? parseLogLevel(process.env.AGENT_LOG_LEVEL) ?? "info",
    prefix: options.prefix ?? "agent-runtime",
    sink: options.sink ?? stderrSink,
    bindings: options.bindings ?? {},
    now: options.now ?? (() => new Date()),
  });
}

function buildLogger(resolved: ResolvedOptions): Logger {
  const isEnabled = (level: LogLevel) =>
    level !== "silent" && LEVEL_ORDER[level] <= LEVEL_ORDER[resolved.level];

  const log = (level: LogLevel, event: string, fields?: LogFields) => {
    if (!isEnabled(level)) return;
    const pairs = formatFields({ ...resolved.bindings, ...fields });
    resolved.sink(
      level,
      `${resolved.now().toISOString()} ${level.toUpperCase().padEnd(5)} [${resolved.prefix}] ${event}${
        pairs ? ` ${pairs}` : ""
      }`,
    );
  };

  return {
    level: resolved.level,
    isEnabled,
    child: (scope, bindings) =>
      buildLogger({
        ...resolved,
        prefix: `${resolved.prefix}:${scope}`,
        bindings: { ...resolved.bindings, ...bindings },
      }),
    with: (bindings) => buildLogger({ ...resolved, bindings: { ...resolved.bindings, ...bindings } }),
    error: (event, fields) => log("error", event, fields),
    warn: (event, fields) => log("warn", event, fields),
    info: (event, fields) => log("info", event, fields),
    debug: (event, fields) => log("debug", event, fields),
    trace: (event, fields) => log("trace", event, fields),
  };
}

/** A logger that drops everything; the default for library components. */
export const silentLogger: Logger = buildLogger({
  level: "silent",
  prefix: "",
  sink: () => undefined,
  bindings: {},
  now: () => new Date(),
});

/**
 * `key=value` pairs; strings with spaces or quotes are JSON-quoted and
 * credentials are masked.
 */
export function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${REDACTED_KEYS.test(key) ? "[REDACTED]" : formatValue(value)}`)
    .join(" ");
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    const text = truncate(value, MAX_VALUE_LENGTH);
    return /^[^\s"=]+$/.test(text) ? text : JSON.stringify(text);
  }
  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return String(value);
  }
  if (value instanceof Error) return JSON.stringify(value.message);
  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = String(value);
  }
  return truncate(text, MAX_VALUE_LENGTH);
}

/**
 * Short description of a payload: strings are clipped, objects reduced to
 * their keys.
 */
export function summarizeForLog(value: unknown, maxLen = 200): string {
  if (value === null || value === undefined) return String(value);
  if (typeof value === "string") return truncate(value, maxLen);
  if (Array.isArray(value)) return `Array(${value.length})`;
  if (typeof value === "object") {
    const keys = Object.keys(value);
    return `Object(keys: ${keys.slice(0, 5).join(", ")}${keys.length > 5 ? ", ..." : ""})`;
  }
  return String(value);
}

function truncate(text: string, maxLen: number): string {
  return text.length > maxLen ? `${text.slice(0, maxLen)}...` : text;
}

/**
 * Parse a level name or a DEBUG-style flag ("1", "true", "off").
 */
export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  if (!raw) return undefined;
  const value = raw.trim().toLowerCase();
  if (!value || value === "0" || value === "false" || value === "off") {
    return "silent";
  }
  if (value === "1" || value === "true" || value === "yes") return "debug";
  if (value === "warning") return "warn";
  if (value === "critical" || value === "fatal") return "error";
  return LOG_LEVELS.find((level) => value.includes(level));
}

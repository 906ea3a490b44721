import { randomUUID } from "crypto";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEnvelope = {
  ts: string;
  level: LogLevel;
  module: string;
  event: string;
  requestId: string;
  data?: unknown;
};

type LogFields = {
  requestId?: string;
  data?: unknown;
};

type LogSink = (entry: LogEnvelope) => void;

export type Logger = {
  debug: (event: string, fields?: LogFields) => LogEnvelope | null;
  info: (event: string, fields?: LogFields) => LogEnvelope | null;
  warn: (event: string, fields?: LogFields) => LogEnvelope | null;
  error: (event: string, fields?: LogFields) => LogEnvelope | null;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const SECRET_KEY_PATTERN = /(token|secret|password|authorization|cookie|api[-_]?key)/i;
const SECRET_VALUE_PATTERN = /(bearer\s+[a-z0-9._-]+|eyJ[a-z0-9_-]+\.[a-z0-9_-]+\.[a-z0-9_-]+)/gi;
// TMDB takes its key as a query parameter, so request URLs end up in log data.
const API_KEY_PARAM_PATTERN = /([?&]api_key=)[^&#\s"]+/gi;

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function redactString(value: string): string {
  return value
    .replace(SECRET_VALUE_PATTERN, "[REDACTED]")
    .replace(API_KEY_PARAM_PATTERN, "$1[REDACTED]");
}

export function redactSensitive(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === "string") {
    return redactString(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: redactString(value.message) };
  }
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SECRET_KEY_PATTERN.test(key)) {
      output[key] = "[REDACTED]";
      continue;
    }
    output[key] = redactSensitive(entry, seen);
  }
  return output;
}

export function createRequestId(): string {
  return randomUUID();
}

const defaultSink: LogSink = (entry) => {
  const payload = JSON.stringify(entry);
  if (entry.level === "error") {
    console.error(payload);
    return;
  }
  if (entry.level === "warn") {
    console.warn(payload);
    return;
  }
  console.log(payload);
};

export function createLogger(moduleName: string, sink: LogSink = defaultSink): Logger {
  const emit = (level: LogLevel, event: string, fields: LogFields = {}): LogEnvelope | null => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return null;
    }
    const entry: LogEnvelope = {
      ts: new Date().toISOString(),
      level,
      module: moduleName,
      event,
      requestId: fields.requestId ?? createRequestId(),
      ...(typeof fields.data === "undefined" ? {} : { data: redactSensitive(fields.data) })
    };
    sink(entry);
    return entry;
  };

  return {
    debug: (event, fields) => emit("debug", event, fields),
    info: (event, fields) => emit("info", event, fields),
    warn: (event, fields) => emit("warn", event, fields),
    error: (event, fields) => emit("error", event, fields)
  };
}

export const __test__ = {
  redactString,
  defaultSink
};

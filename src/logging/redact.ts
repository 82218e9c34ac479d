// src/logging/redact.ts
//
// Single-line, size-bounded logger with credential redaction. Output goes to a LogSink, which is
// stderr in the CLI: stdout belongs to the stdio transport.

import type * as http from "node:http";

export const DEFAULT_LOG_MAX_CHARS = 2048;

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Readonly<{
  debug: (msg: string, meta?: unknown) => void;
  info: (msg: string, meta?: unknown) => void;
  warn: (msg: string, meta?: unknown) => void;
  error: (msg: string, meta?: unknown) => void;
}>;

/** Line-oriented destination for log output. */
export type LogSink = Readonly<{
  appendLine: (line: string) => void;
}>;

export type LoggerOptions = Readonly<{
  debugEnabled: boolean;
  /** Hard cap on one emitted line, prefix included. */
  maxChars?: number;
  timestamps?: boolean;
}>;

const REDACTED = "[REDACTED]";
const TRUNCATION_MARKER = "...[truncated]";

// Header names whose values are credentials or session handles, lower-cased.
const SECRET_HEADERS: ReadonlySet<string> = new Set([
  "authorization",
  "proxy-authorization",
  "cookie",
  "set-cookie",
  "x-api-key",
  "mcp-session-id",
]);

// Secrets that can show up inside free text (a logged header line, an error message).
const SECRET_PATTERNS: ReadonlyArray<readonly [RegExp, string]> = [
  [/(\bBearer\s+)[A-Za-z0-9._~+/=-]+/gi, `$1${REDACTED}`],
  [/(\bMCP-Session-Id\b\s*:\s*)[^\s,]+/gi, `$1${REDACTED}`],
];

export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createStreamSink(stream: NodeJS.WritableStream = process.stderr): LogSink {
  return {
    appendLine: (line) => {
      stream.write(`${line}\n`);
    },
  };
}

export function createLogger(sink: LogSink, opts: LoggerOptions): Logger {
  const maxChars = opts.maxChars ?? DEFAULT_LOG_MAX_CHARS;

  const emit = (level: LogLevel, msg: string, meta?: unknown) => {
    if (level === "debug" && !opts.debugEnabled) return;

    const prefix = opts.timestamps ? `${new Date().toISOString()} [${level}]` : `[${level}]`;
    const head = bound(`${prefix} ${redactString(msg)}`, maxChars);
    // Meta gets whatever room the message leaves.
    const room = maxChars - head.length - 1;
    const tail = meta === undefined || room <= 0 ? "" : " " + bound(metaToText(meta), room);

    sink.appendLine(head + tail);
  };

  return {
    debug: (m, meta) => emit("debug", m, meta),
    info: (m, meta) => emit("info", m, meta),
    warn: (m, meta) => emit("warn", m, meta),
    error: (m, meta) => emit("error", m, meta),
  };
}

/** Header map safe to log: secret headers masked, multi-valued headers joined. */
export function redactHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (SECRET_HEADERS.has(name.toLowerCase())) out[name] = REDACTED;
    else if (value !== undefined) out[name] = Array.isArray(value) ? value.join(",") : value;
  }
  return out;
}

export function redactString(s: string): string {
  return SECRET_PATTERNS.reduce((acc, [pattern, replacement]) => acc.replace(pattern, replacement), s);
}

function bound(s: string, maxChars: number): string {
  if (s.length <= maxChars) return s;
  if (maxChars < TRUNCATION_MARKER.length) return s.slice(0, maxChars);
  return s.slice(0, maxChars - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}

function metaToText(meta: unknown): string {
  try {
    const text = JSON.stringify(meta, (key: string, value: unknown): unknown => {
      if (key !== "" && SECRET_HEADERS.has(key.toLowerCase())) return REDACTED;
      return typeof value === "string" ? redactString(value) : value;
    });
    // JSON.stringify yields undefined for functions and symbols.
    return typeof text === "string" ? redactString(text) : String(meta);
  } catch {
    return "[unserializable]";
  }
}

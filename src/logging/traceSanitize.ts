// src/logging/traceSanitize.ts
//
// Debug-trace views of protocol messages. Credentials are replaced, free text is reduced to its
// length, filesystem locations are masked, and every structure is cut to fixed limits before it
// reaches a log line.

import type { JsonRpcId, McpMessage } from '../mcp/message.js';
import { isRecord } from '../util/json.js';
import { redactString } from './redact.js';

export type TraceLimits = Readonly<{
  depth: number;
  items: number;
  keys: number;
  chars: number;
}>;

export const DEFAULT_TRACE_LIMITS: TraceLimits = { depth: 6, items: 20, keys: 40, chars: 160 };

export type TraceView =
  | Readonly<{ kind: 'request'; id: JsonRpcId; method: string; params?: unknown }>
  | Readonly<{ kind: 'notification'; method: string; params?: unknown }>
  | Readonly<{ kind: 'response'; id: JsonRpcId; result: unknown }>
  | Readonly<{ kind: 'error'; id: JsonRpcId | null; code: number; message: string }>;

const CREDENTIAL_KEY = /authorization|cookie|token|secret|password|api[-_]?key|session-id/i;

// Tool arguments and results under these keys are user content; only the size is traced.
const FREE_TEXT_KEYS = new Set(['text', 'message', 'description', 'detail', 'content', 'contents']);

const REDACTED = '[REDACTED]';
const REDACTED_PATH = '[REDACTED_PATH]';

export function traceView(message: McpMessage, limits: Partial<TraceLimits> = {}): TraceView {
  const lim: TraceLimits = { ...DEFAULT_TRACE_LIMITS, ...limits };
  const scrub = (v: unknown) => scrubValue(v, lim, 0, undefined, new WeakSet());

  switch (message.kind) {
    case 'request': {
      const { id, method, params } = message.msg;
      if (params === undefined) return { kind: 'request', id, method };
      return { kind: 'request', id, method, params: scrub(params) };
    }
    case 'notification': {
      const { method, params } = message.msg;
      if (params === undefined) return { kind: 'notification', method };
      return { kind: 'notification', method, params: scrub(params) };
    }
    case 'response':
      return { kind: 'response', id: message.msg.id, result: scrub(message.msg.result) };
    case 'error':
      return {
        kind: 'error',
        id: message.msg.id,
        code: message.msg.error.code,
        message: clip(maskPaths(redactString(message.msg.error.message)), lim.chars),
      };
  }
}

function scrubValue(
  value: unknown,
  lim: TraceLimits,
  depth: number,
  key: string | undefined,
  seen: WeakSet<object>,
): unknown {
  if (depth > lim.depth) return '[depth]';
  if (typeof value === 'string') {
    if (key !== undefined && FREE_TEXT_KEYS.has(key)) return { len: value.length };
    return clip(maskPaths(redactString(value)), lim.chars);
  }
  if (value === null || typeof value === 'number' || typeof value === 'boolean') return value;

  if (Array.isArray(value)) {
    const out = value.slice(0, lim.items).map((item) => scrubValue(item, lim, depth + 1, undefined, seen));
    if (value.length > lim.items) out.push(`[+${value.length - lim.items} items]`);
    return out;
  }
  if (!isRecord(value)) return `[${typeof value}]`;

  if (seen.has(value)) return '[cycle]';
  seen.add(value);

  const names = Object.keys(value).sort();
  const out: Record<string, unknown> = {};
  for (const name of names.slice(0, lim.keys)) {
    out[name] = CREDENTIAL_KEY.test(name)
      ? REDACTED
      : scrubValue(value[name], lim, depth + 1, name.toLowerCase(), seen);
  }
  if (names.length > lim.keys) out['[+keys]'] = names.length - lim.keys;
  return out;
}

function clip(s: string, chars: number): string {
  return s.length > chars ? `${s.slice(0, chars)}...[truncated]` : s;
}

function maskPaths(s: string): string {
  return s
    .replace(/file:\/\/\/[^\s)]+/g, `file:///${REDACTED_PATH}`)
    .replace(/(^|[\s(])\/[^\s)]+/g, `$1${REDACTED_PATH}`);
}

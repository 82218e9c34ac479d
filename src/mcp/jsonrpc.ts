// src/mcp/jsonrpc.ts
//
// JSON-RPC 2.0 codec: text -> McpMessage (single or batch) and McpMessage -> text.
//
// - Size is checked before any structural parsing.
// - Strict mode: `jsonrpc` must be exactly "2.0"; unknown top-level members are rejected unless
//   extensions are allowed.
// - Lenient mode: the version member may be missing or different; messages are normalized to "2.0".
// - Every function here is pure: no state is shared across calls.

import {
  JSONRPC_INVALID_REQUEST,
  JSONRPC_PARSE_ERROR,
  isJsonRpcErrorObject,
  jsonRpcError,
  type JsonRpcErrorObject,
} from './errors.js';
import {
  JSONRPC_VERSION,
  classifyMessage,
  isJsonRpcId,
  isMethodName,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcNotification,
  type JsonRpcParams,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpErrorMessage,
  type McpMessage,
  type McpNotificationMessage,
  type McpRequestMessage,
  type McpResponseMessage,
} from './message.js';
import { hasOwn, isRecord, isStructured } from '../util/json.js';
import { utf8ByteLength } from '../util/responseSize.js';

export type JsonRpcCodecConfig = Readonly<{
  strictMode: boolean;
  allowExtensions: boolean;
  /** Upper bound on the UTF-8 size of one payload (a batch counts as one payload). */
  maxMessageSize: number;
}>;

export const DEFAULT_CODEC_CONFIG: JsonRpcCodecConfig = {
  strictMode: true,
  allowExtensions: true,
  maxMessageSize: 1024 * 1024,
};

export const STRICT_CODEC_CONFIG: JsonRpcCodecConfig = {
  strictMode: true,
  allowExtensions: false,
  maxMessageSize: 512 * 1024,
};

export const LENIENT_CODEC_CONFIG: JsonRpcCodecConfig = {
  strictMode: false,
  allowExtensions: true,
  maxMessageSize: 2 * 1024 * 1024,
};

const ENVELOPE_MEMBERS = new Set(['jsonrpc', 'id', 'method', 'params', 'result', 'error']);

export type ParseFailureReason = 'size_exceeded' | 'invalid_json' | 'invalid_envelope';

export type ParseFailure = Readonly<{
  ok: false;
  reason: ParseFailureReason;
  error: JsonRpcErrorObject;
}>;

export type ParseJsonRpcMessageResult = Readonly<{ ok: true; message: McpMessage }> | ParseFailure;

export type ParseJsonRpcPayloadResult =
  | Readonly<{ batch: false; entry: ParseJsonRpcMessageResult }>
  | Readonly<{ batch: true; entries: readonly ParseJsonRpcMessageResult[] }>;

// --- parsing ----------------------------------------------------------------

export function parseJsonRpcMessage(
  text: string,
  config: JsonRpcCodecConfig = DEFAULT_CODEC_CONFIG,
): ParseJsonRpcMessageResult {
  const decoded = decode(text, config);
  if (!decoded.ok) return decoded;
  if (Array.isArray(decoded.value)) {
    return invalidEnvelope('batch arrays are not accepted here');
  }
  return validateJsonRpcMessage(decoded.value, config);
}

/** Single message or batch. A malformed batch entry fails alone; its siblings are unaffected. */
export function parseJsonRpcPayload(
  text: string,
  config: JsonRpcCodecConfig = DEFAULT_CODEC_CONFIG,
): ParseJsonRpcPayloadResult {
  const decoded = decode(text, config);
  if (!decoded.ok) return { batch: false, entry: decoded };

  const value = decoded.value;
  if (!Array.isArray(value)) {
    return { batch: false, entry: validateJsonRpcMessage(value, config) };
  }
  if (value.length === 0) {
    return { batch: false, entry: invalidEnvelope('empty batch') };
  }
  return { batch: true, entries: value.map((v) => validateJsonRpcMessage(v, config)) };
}

export function parseJsonRpcRequest(
  text: string,
  config: JsonRpcCodecConfig = DEFAULT_CODEC_CONFIG,
): Readonly<{ ok: true; message: McpRequestMessage | McpNotificationMessage }> | ParseFailure {
  const parsed = parseJsonRpcMessage(text, config);
  if (!parsed.ok) return parsed;
  const m = parsed.message;
  if (m.kind === 'request' || m.kind === 'notification') return { ok: true, message: m };
  return invalidEnvelope('expected a request or notification');
}

export function parseJsonRpcResponse(
  text: string,
  config: JsonRpcCodecConfig = DEFAULT_CODEC_CONFIG,
): Readonly<{ ok: true; message: McpResponseMessage | McpErrorMessage }> | ParseFailure {
  const parsed = parseJsonRpcMessage(text, config);
  if (!parsed.ok) return parsed;
  const m = parsed.message;
  if (m.kind === 'response' || m.kind === 'error') return { ok: true, message: m };
  return invalidEnvelope('expected a response');
}

/** Validate one already-decoded value and build the matching message. */
export function validateJsonRpcMessage(
  value: unknown,
  config: JsonRpcCodecConfig = DEFAULT_CODEC_CONFIG,
): ParseJsonRpcMessageResult {
  if (!isRecord(value)) return invalidEnvelope('message must be an object');

  if (config.strictMode && value.jsonrpc !== JSONRPC_VERSION) {
    return invalidEnvelope('jsonrpc must be "2.0"');
  }

  if (config.strictMode && !config.allowExtensions) {
    const unknown = Object.keys(value).filter((k) => !ENVELOPE_MEMBERS.has(k));
    if (unknown.length > 0) return invalidEnvelope(`unknown member "${unknown[0]}"`);
  }

  const kind = classifyMessage(value);
  if (kind === undefined) return invalidEnvelope('cannot classify message');

  switch (kind) {
    case 'request':
    case 'notification': {
      const method = value.method;
      if (!isMethodName(method)) return invalidEnvelope('method must be a non-empty string');

      const params = value.params;
      if (hasOwn(value, 'params') && !isStructured(params)) {
        return invalidEnvelope('params must be an object or array');
      }
      const paramsPart: { params?: JsonRpcParams } = isStructured(params) ? { params } : {};

      if (kind === 'notification') {
        const msg: JsonRpcNotification = { jsonrpc: JSONRPC_VERSION, method, ...paramsPart };
        return { ok: true, message: { kind, msg } };
      }

      const id = value.id;
      if (!isJsonRpcId(id)) return invalidEnvelope('id must be a string or number');
      const msg: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, id, method, ...paramsPart };
      return { ok: true, message: { kind, msg } };
    }

    case 'response': {
      const id = value.id;
      if (!isJsonRpcId(id)) return invalidEnvelope('id must be a string or number');
      const msg: JsonRpcResponse = { jsonrpc: JSONRPC_VERSION, id, result: value.result };
      return { ok: true, message: { kind, msg } };
    }

    case 'error': {
      const id = value.id;
      if (id !== null && !isJsonRpcId(id)) return invalidEnvelope('id must be a string, number or null');
      const error = value.error;
      if (!isJsonRpcErrorObject(error)) return invalidEnvelope('error must carry an integer code and a message');
      const msg: JsonRpcErrorResponse = { jsonrpc: JSONRPC_VERSION, id, error };
      return { ok: true, message: { kind, msg } };
    }
  }
}

type Decoded = Readonly<{ ok: true; value: unknown }> | ParseFailure;

function decode(text: string, config: JsonRpcCodecConfig): Decoded {
  const size = utf8ByteLength(text);
  if (size > config.maxMessageSize) {
    return {
      ok: false,
      reason: 'size_exceeded',
      error: jsonRpcError(JSONRPC_PARSE_ERROR, 'Parse error', {
        reason: 'size_exceeded',
        maxMessageSize: config.maxMessageSize,
        size,
      }),
    };
  }

  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return {
      ok: false,
      reason: 'invalid_json',
      error: jsonRpcError(JSONRPC_PARSE_ERROR, 'Parse error', { reason: 'invalid_json' }),
    };
  }
}

function invalidEnvelope(detail: string): ParseFailure {
  return {
    ok: false,
    reason: 'invalid_envelope',
    error: jsonRpcError(JSONRPC_INVALID_REQUEST, 'Invalid Request', { reason: 'invalid_envelope', detail }),
  };
}

// --- serialization ----------------------------------------------------------

export function serializeMessage(m: McpMessage): string {
  switch (m.kind) {
    case 'request':
    case 'notification':
      return serializeRequest(m.msg);
    case 'response':
    case 'error':
      return serializeResponse(m.msg);
  }
}

export function serializeRequest(req: JsonRpcRequest | JsonRpcNotification): string {
  return JSON.stringify({
    jsonrpc: JSONRPC_VERSION,
    ...('id' in req ? { id: req.id } : {}),
    method: req.method,
    ...(req.params !== undefined ? { params: req.params } : {}),
  });
}

export function serializeResponse(res: JsonRpcResponse | JsonRpcErrorResponse): string {
  if ('error' in res) {
    return JSON.stringify({ jsonrpc: JSONRPC_VERSION, id: res.id, error: res.error });
  }
  return JSON.stringify({ jsonrpc: JSONRPC_VERSION, id: res.id, result: res.result ?? null });
}

export function serializeError(id: JsonRpcId | null, code: number, message: string, data?: unknown): string {
  return serializeResponse({ jsonrpc: JSONRPC_VERSION, id, error: jsonRpcError(code, message, data) });
}

/** Serialize a batch, keeping entry order. */
export function serializeBatch(messages: readonly McpMessage[]): string {
  return `[${messages.map(serializeMessage).join(',')}]`;
}

// --- identifiers ------------------------------------------------------------

/**
 * Identifier equality: both type and value must match. `1` never equals `"1"`; an explicit null
 * equals only another null; an absent id (undefined) equals only another absent id.
 */
export function idMatch(a: JsonRpcId | null | undefined, b: JsonRpcId | null | undefined): boolean {
  if (a === undefined || b === undefined) return a === b;
  if (a === null || b === null) return a === b;
  return typeof a === typeof b && a === b;
}

export function idToString(id: JsonRpcId | null | undefined): string {
  if (id === undefined || id === null) return 'null';
  return typeof id === 'number' ? String(id) : id;
}

// --- raw-value predicates ---------------------------------------------------

export function isRequestValue(v: unknown): boolean {
  return hasVersion(v) && classifyMessage(v) === 'request';
}

export function isNotificationValue(v: unknown): boolean {
  return hasVersion(v) && classifyMessage(v) === 'notification';
}

/** True for both result responses and error responses. */
export function isResponseValue(v: unknown): boolean {
  if (!hasVersion(v)) return false;
  const kind = classifyMessage(v);
  return kind === 'response' || kind === 'error';
}

export function isErrorResponseValue(v: unknown): boolean {
  return hasVersion(v) && classifyMessage(v) === 'error';
}

function hasVersion(v: unknown): boolean {
  return isRecord(v) && v.jsonrpc === JSONRPC_VERSION;
}

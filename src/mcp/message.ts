// src/mcp/message.ts
//
// Typed JSON-RPC 2.0 / MCP message model.
//
// A message is a tagged union over the four wire shapes. Each variant wraps the exact wire envelope
// (`msg`), so serialization is a plain JSON.stringify of `msg` and field combinations JSON-RPC forbids
// (result + error, neither, method + result) cannot be expressed.

import { isJsonRpcErrorObject, jsonRpcError, type JsonRpcErrorObject } from './errors.js';
import { hasOwn, isRecord, isStructured, takeOwnership } from '../util/json.js';

export const JSONRPC_VERSION = '2.0' as const;

export type JsonRpcId = string | number;

export type JsonRpcParams = Readonly<Record<string, unknown>> | readonly unknown[];

export type JsonRpcRequest = Readonly<{
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  method: string;
  params?: JsonRpcParams;
}>;

export type JsonRpcNotification = Readonly<{
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: JsonRpcParams;
}>;

export type JsonRpcResponse = Readonly<{
  jsonrpc: typeof JSONRPC_VERSION;
  id: JsonRpcId;
  result: unknown;
}>;

export type JsonRpcErrorResponse = Readonly<{
  jsonrpc: typeof JSONRPC_VERSION;
  /** Explicit null when the originating request's id could not be determined. */
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}>;

export type McpMessage =
  | Readonly<{ kind: 'request'; msg: JsonRpcRequest }>
  | Readonly<{ kind: 'notification'; msg: JsonRpcNotification }>
  | Readonly<{ kind: 'response'; msg: JsonRpcResponse }>
  | Readonly<{ kind: 'error'; msg: JsonRpcErrorResponse }>;

export type McpMessageKind = McpMessage['kind'];

export type McpRequestMessage = Extract<McpMessage, { kind: 'request' }>;
export type McpNotificationMessage = Extract<McpMessage, { kind: 'notification' }>;
export type McpResponseMessage = Extract<McpMessage, { kind: 'response' }>;
export type McpErrorMessage = Extract<McpMessage, { kind: 'error' }>;

// --- constructors -----------------------------------------------------------
//
// Constructors take exclusive ownership of structured arguments: they keep a deep copy and freeze the
// envelope, so a message never aliases a caller's object.

export function createRequest(id: JsonRpcId, method: string, params?: JsonRpcParams): McpRequestMessage {
  const msg: JsonRpcRequest = Object.freeze({
    jsonrpc: JSONRPC_VERSION,
    id,
    method,
    ...(params !== undefined ? { params: takeOwnership(params) } : {}),
  });
  return { kind: 'request', msg };
}

export function createNotification(method: string, params?: JsonRpcParams): McpNotificationMessage {
  const msg: JsonRpcNotification = Object.freeze({
    jsonrpc: JSONRPC_VERSION,
    method,
    ...(params !== undefined ? { params: takeOwnership(params) } : {}),
  });
  return { kind: 'notification', msg };
}

export function createResponse(id: JsonRpcId, result: unknown): McpResponseMessage {
  // JSON has no undefined; a missing result is sent as null.
  const msg: JsonRpcResponse = Object.freeze({
    jsonrpc: JSONRPC_VERSION,
    id,
    result: result === undefined ? null : takeOwnership(result),
  });
  return { kind: 'response', msg };
}

export function createErrorResponse(
  id: JsonRpcId | null,
  code: number,
  message: string,
  data?: unknown,
): McpErrorMessage {
  const msg: JsonRpcErrorResponse = Object.freeze({
    jsonrpc: JSONRPC_VERSION,
    id,
    error: Object.freeze(jsonRpcError(code, message, takeOwnership(data))),
  });
  return { kind: 'error', msg };
}

/** Wrap an error object produced elsewhere (dispatch layer, codec) into an error response. */
export function errorResponseFrom(id: JsonRpcId | null, error: JsonRpcErrorObject): McpErrorMessage {
  return createErrorResponse(id, error.code, error.message, error.data);
}

// --- queries ----------------------------------------------------------------

export function isJsonRpcId(v: unknown): v is JsonRpcId {
  if (typeof v === 'string') return true;
  if (typeof v === 'number') return Number.isFinite(v);
  return false;
}

/** Identifier carried by a message; undefined for notifications. */
export function messageId(m: McpMessage): JsonRpcId | null | undefined {
  return m.kind === 'notification' ? undefined : m.msg.id;
}

export function isNotification(m: McpMessage): m is McpNotificationMessage {
  return m.kind === 'notification';
}

export function expectsResponse(m: McpMessage): m is McpRequestMessage {
  return m.kind === 'request';
}

/**
 * Runtime validation of a constructed message. The types already rule out most illegal shapes; this
 * catches values that reached the model through casts or mutation. Never throws.
 */
export function validateMessage(m: McpMessage): boolean {
  const env: Readonly<Record<string, unknown>> = m.msg;
  if (env.jsonrpc !== JSONRPC_VERSION) return false;

  const hasResult = hasOwn(env, 'result');
  const hasError = hasOwn(env, 'error');

  switch (m.kind) {
    case 'request':
      return isJsonRpcId(env.id) && isMethodName(env.method) && paramsOk(env) && !hasResult && !hasError;
    case 'notification':
      return !hasOwn(env, 'id') && isMethodName(env.method) && paramsOk(env) && !hasResult && !hasError;
    case 'response':
      return isJsonRpcId(env.id) && hasResult && !hasError && !hasOwn(env, 'method');
    case 'error':
      return (
        (env.id === null || isJsonRpcId(env.id)) &&
        hasError &&
        !hasResult &&
        !hasOwn(env, 'method') &&
        isJsonRpcErrorObject(env.error)
      );
  }
}

/**
 * Classify a raw decoded value by the presence of `method`, `id`, `result` and `error`.
 * Returns undefined when no single discriminant applies (ambiguous or incomplete objects).
 */
export function classifyMessage(value: unknown): McpMessageKind | undefined {
  if (!isRecord(value)) return undefined;

  const hasMethod = hasOwn(value, 'method');
  const hasId = hasOwn(value, 'id');
  const hasResult = hasOwn(value, 'result');
  const hasError = hasOwn(value, 'error');

  if (hasMethod) {
    if (hasResult || hasError) return undefined;
    return hasId ? 'request' : 'notification';
  }

  if (!hasId || hasResult === hasError) return undefined;
  return hasError ? 'error' : 'response';
}

export function isMethodName(v: unknown): v is string {
  return typeof v === 'string' && v.trim().length > 0;
}

function paramsOk(env: Readonly<Record<string, unknown>>): boolean {
  return !hasOwn(env, 'params') || isStructured(env.params);
}

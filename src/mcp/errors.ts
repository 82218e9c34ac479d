// src/mcp/errors.ts
//
// JSON-RPC 2.0 reserved error codes plus the protocol-specific codes this engine reuses from the
// implementation-defined server-error range.

import { isRecord } from '../util/json.js';

export const JSONRPC_PARSE_ERROR = -32700;
export const JSONRPC_INVALID_REQUEST = -32600;
export const JSONRPC_METHOD_NOT_FOUND = -32601;
export const JSONRPC_INVALID_PARAMS = -32602;
export const JSONRPC_INTERNAL_ERROR = -32603;

/** initialize_session: requested protocol version is not in the supported set. */
export const MCP_UNSUPPORTED_PROTOCOL_VERSION = -32001;
/** An event or session operation is illegal in the current protocol state. */
export const MCP_INVALID_PROTOCOL_STATE = -32002;
/** initialize_session: client capabilities or client info failed schema validation. */
export const MCP_INVALID_CAPABILITIES = -32003;

export type JsonRpcErrorObject = Readonly<{
  code: number;
  message: string;
  data?: unknown;
}>;

const STANDARD_MESSAGES: Readonly<Record<number, string>> = {
  [JSONRPC_PARSE_ERROR]: 'Parse error',
  [JSONRPC_INVALID_REQUEST]: 'Invalid Request',
  [JSONRPC_METHOD_NOT_FOUND]: 'Method not found',
  [JSONRPC_INVALID_PARAMS]: 'Invalid params',
  [JSONRPC_INTERNAL_ERROR]: 'Internal error',
  [MCP_UNSUPPORTED_PROTOCOL_VERSION]: 'Unsupported protocol version',
  [MCP_INVALID_PROTOCOL_STATE]: 'Invalid protocol state',
  [MCP_INVALID_CAPABILITIES]: 'Invalid capabilities',
};

export function standardErrorMessage(code: number): string {
  return STANDARD_MESSAGES[code] ?? 'Unknown error';
}

/** Build an error object; `data` is omitted entirely when undefined. */
export function jsonRpcError(code: number, message?: string, data?: unknown): JsonRpcErrorObject {
  return {
    code,
    message: message ?? standardErrorMessage(code),
    ...(data !== undefined ? { data } : {}),
  };
}

export function isJsonRpcErrorObject(v: unknown): v is JsonRpcErrorObject {
  if (!isRecord(v)) return false;
  if (typeof v.code !== 'number' || !Number.isInteger(v.code)) return false;
  if (typeof v.message !== 'string') return false;
  // data is optional and may be any JSON value.
  return true;
}

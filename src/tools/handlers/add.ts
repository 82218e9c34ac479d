// src/tools/handlers/add.ts

import { JSONRPC_INVALID_PARAMS, jsonRpcError } from '../../mcp/errors.js';
import { isRecord } from '../../util/json.js';
import type { ToolResult } from './types.js';

export type AddOutput = Readonly<{ sum: number }>;

export function handleAdd(args: unknown): ToolResult<AddOutput> {
  if (!isRecord(args) || typeof args.a !== 'number' || typeof args.b !== 'number') {
    return { ok: false, error: jsonRpcError(JSONRPC_INVALID_PARAMS, 'Invalid params') };
  }
  const sum = args.a + args.b;
  // Two finite doubles can still overflow to Infinity, which JSON cannot carry.
  if (!Number.isFinite(sum)) {
    return {
      ok: false,
      error: jsonRpcError(JSONRPC_INVALID_PARAMS, 'Invalid params', { detail: 'sum is not finite' }),
    };
  }
  return { ok: true, result: { sum } };
}

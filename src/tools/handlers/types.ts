import type { JsonRpcErrorObject } from '../../mcp/errors.js';

export type ToolResult<T> =
  | Readonly<{ ok: true; result: T }>
  | Readonly<{ ok: false; error: JsonRpcErrorObject }>;

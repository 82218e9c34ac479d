// src/tools/dispatcher.ts
//
// Routes tools/call to per-tool handlers and keeps src/mcp/handler.ts focused on JSON-RPC and
// lifecycle.
//
// - Arguments are Ajv-validated here, before any handler runs.
// - Successful outputs become MCP ToolCallResult envelopes.
// - Validation and tool errors surface as JSON-RPC error objects.

import { JSONRPC_INTERNAL_ERROR, jsonRpcError, type JsonRpcErrorObject } from '../mcp/errors.js';
import { stableJson } from '../util/json.js';
import { buildToolCatalog, isToolName, type ToolCatalogEntry, type ToolName } from './catalog.js';
import { handleAdd } from './handlers/add.js';
import { handleEcho } from './handlers/echo.js';
import type { ToolResult } from './handlers/types.js';
import type { SchemaRegistry } from './schemaRegistry.js';

export type ToolsListResult = Readonly<{ tools: readonly ToolCatalogEntry[] }>;

export type ToolCallTextContent = Readonly<{
  type: 'text';
  text: string;
}>;

/** `structuredContent` holds the tool-specific output object on success. */
export type ToolCallResult = Readonly<{
  isError: boolean;
  structuredContent: unknown;
  content: readonly ToolCallTextContent[];
}>;

export type DispatchResult =
  | Readonly<{ ok: true; result: ToolCallResult }>
  | Readonly<{ ok: false; error: JsonRpcErrorObject }>;

export type ToolsDispatcherDeps = Readonly<{
  schemaRegistry: SchemaRegistry;
}>;

type RoutedHandler = (args: unknown) => Promise<ToolResult<unknown>> | ToolResult<unknown>;

const ROUTES: Readonly<Record<ToolName, RoutedHandler>> = {
  echo: handleEcho,
  add: handleAdd,
};

export function dispatchToolsList(schemaRegistry: SchemaRegistry): ToolsListResult {
  return { tools: buildToolCatalog((name) => schemaRegistry.getInputSchema(name)) };
}

export async function dispatchToolCall(
  toolName: string,
  args: unknown,
  deps: ToolsDispatcherDeps,
): Promise<DispatchResult> {
  const validated = deps.schemaRegistry.validateInput(toolName, args);
  if (!validated.ok) return { ok: false, error: validated.error };
  if (!isToolName(toolName)) {
    // validateInput only accepts catalog names.
    return { ok: false, error: jsonRpcError(JSONRPC_INTERNAL_ERROR, 'Internal error') };
  }

  const r = await ROUTES[toolName](validated.value);
  if (!r.ok) return { ok: false, error: r.error };

  return { ok: true, result: toToolCallResult(r.result) };
}

function toToolCallResult(structuredContent: unknown): ToolCallResult {
  return {
    isError: false,
    structuredContent,
    content: [{ type: 'text', text: safeStableJson(structuredContent) }],
  };
}

function safeStableJson(v: unknown): string {
  try {
    return stableJson(v);
  } catch {
    return JSON.stringify({ ok: false, error: { message: 'Failed to serialize tool result.' } });
  }
}

// src/server/endpoint.ts
//
// HTTP endpoint semantics on top of the message handler and session store.
//
// - A POST without MCP-Session-Id must be a single `initialize` request; a session is minted for it
//   and the id is returned in the MCP-Session-Id response header.
// - Every other POST must name a live session (missing => 400, unknown or expired => 404).
// - MCP-Protocol-Version, when sent, must equal the version negotiated for the session.
// - DELETE terminates the named session.

import type { Logger } from '../logging/redact.js';
import type { MessageHandler } from '../mcp/handler.js';
import {
  DEFAULT_CODEC_CONFIG,
  parseJsonRpcPayload,
  type JsonRpcCodecConfig,
  type ParseJsonRpcPayloadResult,
} from '../mcp/jsonrpc.js';
import type { McpDeleteHandler, McpPostHandler, McpPostResult } from './router.js';
import type { SessionStore } from './session.js';

export const SESSION_HEADER = 'MCP-Session-Id';

export type McpEndpointDeps = Readonly<{
  handler: MessageHandler;
  sessions: SessionStore;
  codec?: JsonRpcCodecConfig;
  logger?: Logger;
}>;

export type McpEndpoint = Readonly<{
  onMcpPost: McpPostHandler;
  onMcpDelete: McpDeleteHandler;
}>;

export function createMcpEndpoint(deps: McpEndpointDeps): McpEndpoint {
  const codec = deps.codec ?? DEFAULT_CODEC_CONFIG;

  const onMcpPost: McpPostHandler = async (ctx) => {
    const payload = parseJsonRpcPayload(ctx.bodyText, codec);
    const sid = ctx.headers['mcp-session-id'];

    if (sid === undefined) {
      if (!isInitializeRequest(payload)) return { status: 400 };

      const sessionId = deps.sessions.create();
      const entry = deps.sessions.get(sessionId);
      if (!entry) return { status: 500 };

      const bodyText = await deps.handler.handlePayload(payload, entry.machine);
      if (entry.machine.currentState !== 'initializing') {
        // Negotiation failed; the error response goes out without a session.
        deps.sessions.delete(sessionId);
        return toResult(bodyText);
      }
      deps.logger?.debug('Session created.', { sessions: deps.sessions.size() });
      return toResult(bodyText, { [SESSION_HEADER]: sessionId });
    }

    const required = deps.sessions.require(sid);
    if (!required.ok) return { status: required.status };

    const machine = required.session.machine;
    const negotiated = machine.sessionInfo.protocolVersion;
    const pv = ctx.headers['mcp-protocol-version'];
    if (pv !== undefined && negotiated !== undefined && pv !== negotiated) {
      deps.logger?.debug('Protocol version header mismatch.', { expected: negotiated, got: pv });
      return { status: 400 };
    }

    return toResult(await deps.handler.handlePayload(payload, machine));
  };

  const onMcpDelete: McpDeleteHandler = (ctx) => {
    const sid = ctx.headers['mcp-session-id'];
    if (sid === undefined) return { status: 400 };
    return { status: deps.sessions.delete(sid) ? 204 : 404 };
  };

  return { onMcpPost, onMcpDelete };
}

function isInitializeRequest(payload: ParseJsonRpcPayloadResult): boolean {
  if (payload.batch || !payload.entry.ok) return false;
  const m = payload.entry.message;
  return m.kind === 'request' && m.msg.method === 'initialize';
}

function toResult(bodyText: string | undefined, headers?: Readonly<Record<string, string>>): McpPostResult {
  // Nothing owed (notifications, responses): 202 Accepted, empty body.
  if (bodyText === undefined) return { status: 202, ...(headers ? { headers } : {}) };
  return { status: 200, ...(headers ? { headers } : {}), bodyText };
}

// src/mcp/handler.ts
//
// MCP message handler: codec + protocol state machine + tool dispatcher.
//
// - One payload (single message or batch) at a time per state machine; callers serialize.
// - Lifecycle: initialize (-> INITIALIZING), notifications/initialized (-> INITIALIZED -> READY).
// - Every other request fires the `request` event; an illegal event is answered with -32600.
// - Routing: ping, tools/list, tools/call (delegated to tools/dispatcher), and the resources/* methods
//   when a resource registry is configured.
// - Parse failures are answered with an error response carrying a null id.
// - Tool calls and resource reads are bounded by the session's requestTimeoutMs; batches by its
//   maxPendingRequests. maxResponseBytes applies to a whole batch reply as well as to each entry.
// - Notifications and received responses produce no output.

import type { Logger } from '../logging/redact.js';
import { traceView } from '../logging/traceSanitize.js';
import type { ResourceRegistry } from '../resources/registry.js';
import { dispatchToolCall, dispatchToolsList, type DispatchResult } from '../tools/dispatcher.js';
import type { SchemaRegistry } from '../tools/schemaRegistry.js';
import { isRecord } from '../util/json.js';
import { exceedsByteLimit, utf8ByteLength } from '../util/responseSize.js';
import { serverCapabilitiesToWire } from './capabilities.js';
import {
  JSONRPC_INTERNAL_ERROR,
  JSONRPC_INVALID_PARAMS,
  JSONRPC_INVALID_REQUEST,
  JSONRPC_METHOD_NOT_FOUND,
  MCP_INVALID_CAPABILITIES,
  MCP_UNSUPPORTED_PROTOCOL_VERSION,
  jsonRpcError,
  type JsonRpcErrorObject,
} from './errors.js';
import {
  DEFAULT_CODEC_CONFIG,
  parseJsonRpcPayload,
  serializeBatch,
  serializeMessage,
  type JsonRpcCodecConfig,
  type ParseJsonRpcMessageResult,
  type ParseJsonRpcPayloadResult,
} from './jsonrpc.js';
import {
  createErrorResponse,
  createResponse,
  errorResponseFrom,
  type JsonRpcId,
  type JsonRpcParams,
  type McpMessage,
  type McpNotificationMessage,
  type McpRequestMessage,
} from './message.js';
import type { ProtocolSchemas } from './protocolSchemas.js';
import { stateToString, type ProtocolState, type ProtocolStateMachine } from './protocolState.js';

export const ERROR_CODE_CAP_EXCEEDED = 'MCP_SESSION_ENGINE/CAP_EXCEEDED' as const;
export const ERROR_CODE_TIMEOUT = 'MCP_SESSION_ENGINE/TIMEOUT' as const;
const ERROR_CODE_INVALID_PARAMS = 'MCP_SESSION_ENGINE/INVALID_PARAMS' as const;

export type MessageHandlerOptions = Readonly<{
  schemaRegistry: SchemaRegistry;
  protocolSchemas: ProtocolSchemas;
  codec?: JsonRpcCodecConfig;
  /** Upper bound on one serialized response; larger results become -32603. */
  maxResponseBytes: number;
  /** Serves resources/list, resources/templates/list and resources/read; without it they are -32601. */
  resourceRegistry?: ResourceRegistry;
  /** Tool-call backend. Default: validate against schemaRegistry and run the built-in tools. */
  callTool?: ToolCallBackend;
  logger?: Logger;
  /** Debug traces of every inbound and outbound message (sanitized, bounded). */
  traceLogger?: Logger;
}>;

export type ToolCallBackend = (name: string, args: unknown) => Promise<DispatchResult>;

export type MessageHandler = Readonly<{
  /** Decode and handle one payload. Resolves to the response text, or undefined when nothing is owed. */
  handleText: (text: string, machine: ProtocolStateMachine) => Promise<string | undefined>;
  /** Same as handleText for a payload the caller already decoded. */
  handlePayload: (
    payload: ParseJsonRpcPayloadResult,
    machine: ProtocolStateMachine,
  ) => Promise<string | undefined>;
  /** Handle one decoded message. Resolves to the response message, or undefined. */
  handleMessage: (message: McpMessage, machine: ProtocolStateMachine) => Promise<McpMessage | undefined>;
}>;

const PRE_READY_STATES: ReadonlySet<ProtocolState> = new Set(['uninitialized', 'initializing', 'initialized']);

export function createMessageHandler(opts: MessageHandlerOptions): MessageHandler {
  const codec = opts.codec ?? DEFAULT_CODEC_CONFIG;
  const callTool: ToolCallBackend =
    opts.callTool ?? ((name, args) => dispatchToolCall(name, args, { schemaRegistry: opts.schemaRegistry }));

  const trace = (direction: 'in' | 'out', message: McpMessage) => {
    opts.traceLogger?.debug(`trace.${direction}`, traceView(message));
  };

  const handleEntry = async (
    entry: ParseJsonRpcMessageResult,
    machine: ProtocolStateMachine,
  ): Promise<McpMessage | undefined> => {
    if (!entry.ok) {
      opts.logger?.debug('Rejected payload.', { reason: entry.reason });
      const out = errorResponseFrom(null, entry.error);
      trace('out', out);
      return out;
    }
    return await handleMessage(entry.message, machine);
  };

  const handleMessage = async (
    message: McpMessage,
    machine: ProtocolStateMachine,
  ): Promise<McpMessage | undefined> => {
    trace('in', message);
    machine.touch();

    switch (message.kind) {
      case 'response':
      case 'error':
        // Nothing is sent in reply to a response.
        if (!machine.transition('response')) {
          opts.logger?.debug('Ignored response outside READY.', { state: machine.currentState });
        }
        return undefined;
      case 'notification':
        handleNotification(message, machine);
        return undefined;
      case 'request': {
        const out = capResponse(await handleRequest(message, machine));
        trace('out', out);
        return out;
      }
    }
  };

  const handleNotification = (message: McpNotificationMessage, machine: ProtocolStateMachine): void => {
    const method = message.msg.method;

    if (method === 'notifications/initialized') {
      if (machine.currentState === 'initializing') machine.completeInitializeResponse();
      // Outside INITIALIZED the event is illegal; transition() applies the strict-mode policy.
      const ok =
        machine.currentState === 'initialized'
          ? machine.finalizeInitialization().ok
          : machine.transition('initializedNotification');
      if (!ok) opts.logger?.debug('Out-of-sequence initialized notification.', { state: machine.currentState });
      return;
    }

    if (!machine.transition('notification')) {
      opts.logger?.debug('Dropped notification outside READY.', { method, state: machine.currentState });
    }
  };

  const handleRequest = async (message: McpRequestMessage, machine: ProtocolStateMachine): Promise<McpMessage> => {
    const req = message.msg;

    if (req.method === 'initialize') return initialize(req.id, req.params, machine);

    if (req.method.startsWith('notifications/')) {
      return createErrorResponse(req.id, JSONRPC_INVALID_REQUEST, 'Invalid Request', {
        detail: 'notifications must not carry an id',
      });
    }

    // Liveness checks are answered in every state.
    if (req.method === 'ping') {
      if (machine.isReady()) machine.transition('request');
      return createResponse(req.id, {});
    }

    const before = machine.currentState;
    if (!machine.transition('request')) {
      return createErrorResponse(req.id, JSONRPC_INVALID_REQUEST, ...gatingError(before, machine));
    }

    switch (req.method) {
      case 'tools/list':
        return createResponse(req.id, dispatchToolsList(opts.schemaRegistry));
      case 'tools/call': {
        const call = parseToolsCallParams(req.params);
        if (!call.ok) {
          return createErrorResponse(req.id, JSONRPC_INVALID_PARAMS, 'Invalid params', {
            code: ERROR_CODE_INVALID_PARAMS,
          });
        }
        const dispatched = await withTimeout(callTool(call.name, call.arguments), machine.requestTimeoutMs);
        return dispatched.ok ? createResponse(req.id, dispatched.result) : errorResponseFrom(req.id, dispatched.error);
      }
    }

    const resources = opts.resourceRegistry;
    if (resources) {
      switch (req.method) {
        case 'resources/list':
          return createResponse(req.id, { resources: resources.list() });
        case 'resources/templates/list':
          return createResponse(req.id, { resourceTemplates: resources.listTemplates() });
        case 'resources/read': {
          const check = opts.protocolSchemas.checkResourcesReadParams(req.params ?? {});
          if (!check.ok || !isRecord(req.params) || typeof req.params.uri !== 'string') {
            return createErrorResponse(req.id, JSONRPC_INVALID_PARAMS, 'Invalid params', {
              code: ERROR_CODE_INVALID_PARAMS,
              issues: check.ok ? [] : check.issues,
            });
          }
          const read = await withTimeout(resources.read(req.params.uri), machine.requestTimeoutMs);
          return read.ok ? createResponse(req.id, read.result) : errorResponseFrom(req.id, read.error);
        }
      }
    }

    return createErrorResponse(req.id, JSONRPC_METHOD_NOT_FOUND, 'Method not found');
  };

  const initialize = (id: JsonRpcId, params: JsonRpcParams | undefined, machine: ProtocolStateMachine): McpMessage => {
    if (machine.currentState === 'shutdown') {
      return createErrorResponse(id, JSONRPC_INVALID_REQUEST, 'Invalid Request', { detail: 'session is shut down' });
    }
    // A session stuck in ERROR starts over on a fresh initialize.
    if (machine.currentState === 'error') machine.resetSession();

    const paramsCheck = opts.protocolSchemas.checkInitializeParams(params ?? {});
    if (!paramsCheck.ok || !isRecord(params)) {
      return createErrorResponse(id, JSONRPC_INVALID_PARAMS, 'Invalid params', {
        code: ERROR_CODE_INVALID_PARAMS,
        issues: paramsCheck.ok ? [] : paramsCheck.issues,
      });
    }

    const version = typeof params.protocolVersion === 'string' ? params.protocolVersion : '';
    const r = machine.initializeSession(version, params.capabilities, params.clientInfo);
    if (!r.ok) {
      // Negotiation failures are invalid params; sequencing failures are invalid requests.
      const negotiation = r.code === MCP_UNSUPPORTED_PROTOCOL_VERSION || r.code === MCP_INVALID_CAPABILITIES;
      const data = { ...(isRecord(r.data) ? r.data : {}), reason: r.code, detail: r.message };
      return negotiation
        ? createErrorResponse(id, JSONRPC_INVALID_PARAMS, 'Invalid params', data)
        : createErrorResponse(id, JSONRPC_INVALID_REQUEST, 'Invalid Request', data);
    }

    const session = machine.sessionInfo;
    return createResponse(id, {
      protocolVersion: session.protocolVersion ?? version,
      capabilities: serverCapabilitiesToWire(session.capabilities),
      ...(session.serverInfo ? { serverInfo: session.serverInfo } : {}),
    });
  };

  const capResponse = (out: McpMessage): McpMessage => {
    if (out.kind !== 'response') return out;
    if (!exceedsByteLimit(serializeMessage(out), opts.maxResponseBytes)) return out;
    return errorResponseFrom(out.msg.id, capExceededError('Response exceeded maxResponseBytes.'));
  };

  // Results that would push the batch array past the cap become CAP_EXCEEDED; errors are kept as is.
  const capBatch = (responses: readonly McpMessage[]): McpMessage[] => {
    if (!Number.isFinite(opts.maxResponseBytes) || opts.maxResponseBytes <= 0) return [...responses];
    let used = 2; // []
    return responses.map((out, i) => {
      const separator = i === 0 ? 0 : 1;
      let kept = out;
      if (out.kind === 'response' && used + separator + utf8ByteLength(serializeMessage(out)) > opts.maxResponseBytes) {
        kept = errorResponseFrom(out.msg.id, capExceededError('Batch response exceeded maxResponseBytes.'));
        trace('out', kept);
      }
      used += separator + utf8ByteLength(serializeMessage(kept));
      return kept;
    });
  };

  const handlePayload = async (
    payload: ParseJsonRpcPayloadResult,
    machine: ProtocolStateMachine,
  ): Promise<string | undefined> => {
    if (!payload.batch) {
      const out = await handleEntry(payload.entry, machine);
      return out ? serializeMessage(out) : undefined;
    }

    if (payload.entries.length > machine.maxPendingRequests) {
      const out = createErrorResponse(null, JSONRPC_INVALID_REQUEST, 'Invalid Request', {
        detail: 'batch exceeds maxPendingRequests',
        maxPendingRequests: machine.maxPendingRequests,
      });
      trace('out', out);
      return serializeMessage(out);
    }

    // Entries run in order; a batch of notifications gets no reply at all.
    const responses: McpMessage[] = [];
    for (const entry of payload.entries) {
      const out = await handleEntry(entry, machine);
      if (out) responses.push(out);
    }
    return responses.length > 0 ? serializeBatch(capBatch(responses)) : undefined;
  };

  return {
    handleText: async (text, machine) => await handlePayload(parseJsonRpcPayload(text, codec), machine),
    handlePayload,
    handleMessage,
  };
}

function gatingError(before: ProtocolState, machine: ProtocolStateMachine): [string, unknown] {
  if (PRE_READY_STATES.has(before)) {
    const detail =
      before === 'uninitialized' ? 'initialize not received' : 'notifications/initialized not received';
    return ['Not initialized', { detail }];
  }
  return [
    'Invalid Request',
    { detail: machine.lastErrorMessage ?? `session is in state ${stateToString(machine.currentState)}` },
  ];
}

function capExceededError(message: string): JsonRpcErrorObject {
  return jsonRpcError(JSONRPC_INTERNAL_ERROR, 'Internal error', { code: ERROR_CODE_CAP_EXCEEDED, message });
}

type Outcome<T> = Readonly<{ ok: true; result: T }> | Readonly<{ ok: false; error: JsonRpcErrorObject }>;

async function withTimeout<T>(work: Promise<Outcome<T>>, timeoutMs: number): Promise<Outcome<T>> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<Outcome<T>>((resolve) => {
    timer = setTimeout(
      () =>
        resolve({
          ok: false,
          error: jsonRpcError(JSONRPC_INTERNAL_ERROR, 'Internal error', { code: ERROR_CODE_TIMEOUT, timeoutMs }),
        }),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

type ToolsCallParams =
  | Readonly<{ ok: true; name: string; arguments: unknown }>
  | Readonly<{ ok: false }>;

function parseToolsCallParams(params: unknown): ToolsCallParams {
  if (!isRecord(params)) return { ok: false };
  const name = params.name;
  if (typeof name !== 'string' || name.length === 0) return { ok: false };
  const args = params.arguments;
  // Omitted arguments are an empty object.
  if (args === undefined) return { ok: true, name, arguments: {} };
  if (!isRecord(args)) return { ok: false };
  return { ok: true, name, arguments: args };
}

export * from './mcp/errors.js';
export * from './mcp/message.js';
export * from './mcp/jsonrpc.js';
export * from './mcp/capabilities.js';
export * from './mcp/sessionInfo.js';
export * from './mcp/protocolSchemas.js';
export * from './mcp/protocolState.js';
export {
  createMessageHandler,
  type MessageHandler,
  type MessageHandlerOptions,
  type ToolCallBackend,
} from './mcp/handler.js';
export { createSessionStore, type SessionStore, type SessionEntry } from './server/session.js';
export { createMcpEndpoint, SESSION_HEADER, type McpEndpoint } from './server/endpoint.js';
export { createRouter, type McpPostContext, type McpPostResult, type McpPostHandler } from './server/router.js';
export { HttpServer } from './server/httpServer.js';
export { StdioTransport } from './server/stdio.js';
export { SchemaRegistry } from './tools/schemaRegistry.js';
export {
  ResourceRegistry,
  type ResourceBody,
  type ResourceDescriptor,
  type ResourceTemplateDescriptor,
  type ResourcesReadResult,
} from './resources/registry.js';
export { createEngineResources } from './resources/engineResources.js';
export { TOOL_NAMES, type ToolName, type ToolCatalogEntry } from './tools/catalog.js';
export { dispatchToolCall, dispatchToolsList, type ToolCallResult } from './tools/dispatcher.js';
export { readSettings, DEFAULT_SETTINGS, ENV_VARS, type EngineSettings } from './config.js';
export { buildEngine, startEngine, type RunningEngine } from './runtime.js';
export { createLogger, createStreamSink, NOOP_LOGGER, type Logger, type LogSink } from './logging/redact.js';

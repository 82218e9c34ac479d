// src/runtime.ts
//
// Assembles the engine for a transport: schemas, handler, state machines, then the stdio loop or the
// HTTP server.

import * as path from 'node:path';
import type { EngineSettings } from './config.js';
import type { Logger } from './logging/redact.js';
import { defaultServerCapabilities, type Capabilities } from './mcp/capabilities.js';
import { createMessageHandler, type MessageHandler } from './mcp/handler.js';
import { DEFAULT_CODEC_CONFIG, LENIENT_CODEC_CONFIG, type JsonRpcCodecConfig } from './mcp/jsonrpc.js';
import { ProtocolSchemas } from './mcp/protocolSchemas.js';
import { ProtocolStateMachine, SUPPORTED_PROTOCOL_VERSIONS } from './mcp/protocolState.js';
import type { PeerInfo } from './mcp/sessionInfo.js';
import { createEngineResources } from './resources/engineResources.js';
import { createMcpEndpoint } from './server/endpoint.js';
import { HttpServer } from './server/httpServer.js';
import { createSessionStore } from './server/session.js';
import { StdioTransport } from './server/stdio.js';
import { SchemaRegistry } from './tools/schemaRegistry.js';
import { findPackageRoot, readJsonObjectFile } from './util/packageRoot.js';

export type EngineDeps = Readonly<{
  logger: Logger;
  traceLogger?: Logger;
  /** stdio only; default process.stdin / process.stdout. */
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}>;

export type RunningEngine = Readonly<{
  /** Settles when the transport has finished (stdio input ended, or stop() completed). */
  done: Promise<void>;
  stop: () => Promise<void>;
  /** Bound HTTP port; undefined for stdio. */
  port: number | undefined;
}>;

/** Server capabilities advertised by this engine: the core defaults plus tools, and resources when any are registered. */
export function engineServerCapabilities(opts: Readonly<{ resources?: boolean }> = {}): Capabilities {
  const base = defaultServerCapabilities();
  return { ...base, server: { ...base.server, tools: true, resources: opts.resources ?? false } };
}

export function codecConfigFor(settings: EngineSettings): JsonRpcCodecConfig {
  const base = settings.strictMode ? DEFAULT_CODEC_CONFIG : LENIENT_CODEC_CONFIG;
  return { ...base, maxMessageSize: settings.maxMessageBytes };
}

export function readServerInfo(): PeerInfo {
  const pkg: Record<string, unknown> = {
    ...readJsonObjectFile(path.join(findPackageRoot(import.meta.url), 'package.json')),
  };
  return {
    name: typeof pkg['name'] === 'string' && pkg['name'] ? pkg['name'] : 'mcp-session-engine',
    version: typeof pkg['version'] === 'string' && pkg['version'] ? pkg['version'] : '0.0.0',
  };
}

export type EngineParts = Readonly<{
  handler: MessageHandler;
  createMachine: () => ProtocolStateMachine;
  codec: JsonRpcCodecConfig;
}>;

/** Throws when schema files are missing or invalid. */
export function buildEngine(settings: EngineSettings, deps: Pick<EngineDeps, 'logger' | 'traceLogger'>): EngineParts {
  const protocolSchemas = ProtocolSchemas.getOrCreate();
  const codec = codecConfigFor(settings);
  const serverInfo = readServerInfo();
  const schemaRegistry = SchemaRegistry.getOrCreate();
  const resourceRegistry = createEngineResources({
    serverInfo,
    supportedVersions: SUPPORTED_PROTOCOL_VERSIONS,
    schemaRegistry,
  });
  const serverCapabilities = engineServerCapabilities({ resources: resourceRegistry.size > 0 });

  const handler = createMessageHandler({
    schemaRegistry,
    protocolSchemas,
    resourceRegistry,
    codec,
    maxResponseBytes: settings.maxResponseBytes,
    logger: deps.logger,
    ...(deps.traceLogger ? { traceLogger: deps.traceLogger } : {}),
  });

  const createMachine = () =>
    new ProtocolStateMachine({
      strictMode: settings.strictMode,
      requestTimeoutMs: settings.requestTimeoutMs,
      serverCapabilities,
      serverInfo,
      validator: protocolSchemas,
      logger: deps.logger,
    });

  return { handler, createMachine, codec };
}

export async function startEngine(settings: EngineSettings, deps: EngineDeps): Promise<RunningEngine> {
  const { handler, createMachine, codec } = buildEngine(settings, deps);

  if (settings.transport === 'stdio') {
    const transport = new StdioTransport({
      handler,
      machine: createMachine(),
      logger: deps.logger,
      ...(deps.input ? { input: deps.input } : {}),
      ...(deps.output ? { output: deps.output } : {}),
    });
    const done = transport.run();
    return {
      done,
      stop: async () => {
        transport.stop();
        await done;
      },
      port: undefined,
    };
  }

  const sessions = createSessionStore({
    createMachine,
    maxSessions: settings.maxSessions,
    idleTimeoutMs: settings.idleTimeoutMs,
  });
  const endpoint = createMcpEndpoint({ handler, sessions, codec, logger: deps.logger });
  const server = new HttpServer({
    settings,
    logger: deps.logger,
    onMcpPost: endpoint.onMcpPost,
    onMcpDelete: endpoint.onMcpDelete,
    sessions,
  });
  await server.start();

  let resolveDone: () => void = () => undefined;
  const done = new Promise<void>((resolve) => {
    resolveDone = resolve;
  });
  return {
    done,
    stop: async () => {
      await server.stop();
      resolveDone();
    },
    port: server.port,
  };
}

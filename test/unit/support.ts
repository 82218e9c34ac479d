import { expect } from 'chai';
import { createMessageHandler, type MessageHandler, type MessageHandlerOptions } from '../../src/mcp/handler.js';
import { ProtocolSchemas } from '../../src/mcp/protocolSchemas.js';
import { ProtocolStateMachine, type ProtocolStateMachineOptions } from '../../src/mcp/protocolState.js';
import { engineServerCapabilities } from '../../src/runtime.js';
import { SchemaRegistry } from '../../src/tools/schemaRegistry.js';
import type { LogSink } from '../../src/logging/redact.js';

export const TEST_SERVER_INFO = { name: 'test', version: '0.0.0' } as const;

export class CollectingSink implements LogSink {
  public lines: string[] = [];

  public appendLine(line: string): void {
    this.lines.push(line);
  }
}

export function createTestHandler(overrides: Partial<MessageHandlerOptions> = {}): MessageHandler {
  return createMessageHandler({
    schemaRegistry: SchemaRegistry.getOrCreate(),
    protocolSchemas: ProtocolSchemas.getOrCreate(),
    maxResponseBytes: 1024 * 1024,
    ...overrides,
  });
}

export function createTestMachine(opts: ProtocolStateMachineOptions = {}): ProtocolStateMachine {
  return new ProtocolStateMachine({
    serverCapabilities: engineServerCapabilities(),
    serverInfo: TEST_SERVER_INFO,
    ...opts,
  });
}

/** Send one JSON value; resolves to the parsed reply, or undefined when none was produced. */
export async function send(handler: MessageHandler, machine: ProtocolStateMachine, message: unknown): Promise<unknown> {
  const text = await handler.handleText(JSON.stringify(message), machine);
  return text === undefined ? undefined : JSON.parse(text);
}

export async function handshake(handler: MessageHandler, machine: ProtocolStateMachine): Promise<void> {
  await send(handler, machine, {
    jsonrpc: '2.0',
    id: 0,
    method: 'initialize',
    params: { protocolVersion: '2025-06-18', capabilities: {}, clientInfo: { name: 'client', version: '1.0.0' } },
  });
  await send(handler, machine, { jsonrpc: '2.0', method: 'notifications/initialized' });
  expect(machine.currentState).to.equal('ready');
}

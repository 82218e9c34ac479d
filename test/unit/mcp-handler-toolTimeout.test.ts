import { expect } from 'chai';
import type { ToolCallBackend } from '../../src/mcp/handler.js';
import { createTestHandler, createTestMachine, handshake, send } from './support.js';

describe('mcp handler tool-call timeout', () => {
  it('answers a tool call that outlives requestTimeoutMs with TIMEOUT', async () => {
    const callTool: ToolCallBackend = () => new Promise(() => undefined);
    const handler = createTestHandler({ callTool });
    const machine = createTestMachine({ requestTimeoutMs: 1 });
    await handshake(handler, machine);

    const res = await send(handler, machine, {
      jsonrpc: '2.0',
      id: 11,
      method: 'tools/call',
      params: { name: 'slow', arguments: {} },
    });
    expect(res).to.deep.equal({
      jsonrpc: '2.0',
      id: 11,
      error: {
        code: -32603,
        message: 'Internal error',
        data: { code: 'MCP_SESSION_ENGINE/TIMEOUT', timeoutMs: 1 },
      },
    });
    expect(machine.currentState).to.equal('ready');
  });

  it('passes through a backend result that arrives in time', async () => {
    const seen: Array<[string, unknown]> = [];
    const callTool: ToolCallBackend = async (name, args) => {
      seen.push([name, args]);
      return { ok: true, result: { isError: false, structuredContent: { done: true }, content: [] } };
    };
    const handler = createTestHandler({ callTool });
    const machine = createTestMachine({ requestTimeoutMs: 1000 });
    await handshake(handler, machine);

    const res = await send(handler, machine, {
      jsonrpc: '2.0',
      id: 12,
      method: 'tools/call',
      params: { name: 'fast' },
    });
    expect(res).to.deep.equal({
      jsonrpc: '2.0',
      id: 12,
      result: { isError: false, structuredContent: { done: true }, content: [] },
    });
    expect(seen).to.deep.equal([['fast', {}]]);
  });
});

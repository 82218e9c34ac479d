import { expect } from 'chai';
import { createLogger } from '../../src/logging/redact.js';
import { traceView } from '../../src/logging/traceSanitize.js';
import { createRequest } from '../../src/mcp/message.js';
import { CollectingSink, createTestHandler, createTestMachine, send } from './support.js';

describe('trace logging', () => {
  it('emits bounded, sanitized JSON-RPC traces', async () => {
    const output = new CollectingSink();
    const traceLogger = createLogger(output, { debugEnabled: true, maxChars: 160 });
    const handler = createTestHandler({ traceLogger });
    const machine = createTestMachine();

    await send(handler, machine, {
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { protocolVersion: '2025-06-18', capabilities: {} },
    });
    await send(handler, machine, { jsonrpc: '2.0', method: 'notifications/initialized', params: {} });
    await send(handler, machine, {
      jsonrpc: '2.0',
      id: 3,
      method: 'tools/call',
      params: {
        name: 'unknown_tool',
        arguments: {
          uri: 'file:///tmp/secret-path',
          text: 'x'.repeat(500),
          authorization: 'Bearer secret-token',
          'mcp-session-id': 'session-123',
        },
      },
    });

    const joined = output.lines.join('\n');
    expect(joined).to.include('trace.in');
    expect(joined).to.include('trace.out');
    expect(joined).to.not.include('file:///tmp/secret-path');
    expect(joined).to.not.include('secret-token');
    expect(joined).to.not.include('session-123');

    for (const line of output.lines) {
      expect(line.length).to.be.at.most(160);
    }
  });

  it('emits nothing without a trace logger', async () => {
    const output = new CollectingSink();
    const logger = createLogger(output, { debugEnabled: false });
    const handler = createTestHandler({ logger });
    const machine = createTestMachine();

    await handler.handleText('{', machine);
    expect(output.lines).to.deep.equal([]);
  });

  it('redacts secrets, paths and free text in message views', () => {
    const view = traceView(
      createRequest(3, 'tools/call', {
        name: 'echo',
        arguments: { text: 'hello', token: 'test-secret', uri: 'file:///home/u/a.txt', path: '/etc/hosts x' },
      }),
    );

    expect(view).to.deep.equal({
      kind: 'request',
      id: 3,
      method: 'tools/call',
      params: {
        name: 'echo',
        arguments: {
          path: '[REDACTED_PATH] x',
          text: { len: 5 },
          token: '[REDACTED]',
          uri: 'file:///[REDACTED_PATH]',
        },
      },
    });
  });
});

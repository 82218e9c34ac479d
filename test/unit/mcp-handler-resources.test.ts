import { expect } from 'chai';
import { ResourceRegistry } from '../../src/resources/registry.js';
import { createTestHandler, createTestMachine, handshake, send } from './support.js';

function memoRegistry(): ResourceRegistry {
  const registry = new ResourceRegistry();
  registry.addResource({ uri: 'memo://readme', name: 'readme', description: 'Read me first' }, 'hello');
  registry.addTemplate(
    { uriTemplate: 'memo://notes/{id}', name: 'note', mimeType: 'text/markdown' },
    ({ id }) => (id === '7' ? '# seven' : undefined),
  );
  return registry;
}

type ErrorReply = { error: { code: number; message: string; data?: { code?: string; issues?: unknown[] } } };

describe('mcp handler resources', () => {
  it('lists resources and templates', async () => {
    const handler = createTestHandler({ resourceRegistry: memoRegistry() });
    const machine = createTestMachine();
    await handshake(handler, machine);

    expect(await send(handler, machine, { jsonrpc: '2.0', id: 1, method: 'resources/list' })).to.deep.equal({
      jsonrpc: '2.0',
      id: 1,
      result: {
        resources: [{ uri: 'memo://readme', name: 'readme', description: 'Read me first', mimeType: 'text/plain' }],
      },
    });
    expect(await send(handler, machine, { jsonrpc: '2.0', id: 2, method: 'resources/templates/list' })).to.deep.equal({
      jsonrpc: '2.0',
      id: 2,
      result: { resourceTemplates: [{ uriTemplate: 'memo://notes/{id}', name: 'note', mimeType: 'text/markdown' }] },
    });
  });

  it('reads static and templated resources', async () => {
    const handler = createTestHandler({ resourceRegistry: memoRegistry() });
    const machine = createTestMachine();
    await handshake(handler, machine);

    expect(
      await send(handler, machine, { jsonrpc: '2.0', id: 3, method: 'resources/read', params: { uri: 'memo://readme' } }),
    ).to.deep.equal({
      jsonrpc: '2.0',
      id: 3,
      result: { contents: [{ uri: 'memo://readme', mimeType: 'text/plain', text: 'hello' }] },
    });
    expect(
      await send(handler, machine, { jsonrpc: '2.0', id: 4, method: 'resources/read', params: { uri: 'memo://notes/7' } }),
    ).to.deep.equal({
      jsonrpc: '2.0',
      id: 4,
      result: { contents: [{ uri: 'memo://notes/7', mimeType: 'text/markdown', text: '# seven' }] },
    });
  });

  it('validates resources/read params against the schema', async () => {
    const handler = createTestHandler({ resourceRegistry: memoRegistry() });
    const machine = createTestMachine();
    await handshake(handler, machine);

    const missing = (await send(handler, machine, {
      jsonrpc: '2.0',
      id: 5,
      method: 'resources/read',
      params: {},
    })) as ErrorReply;
    expect(missing.error.code).to.equal(-32602);
    expect(missing.error.data?.code).to.equal('MCP_SESSION_ENGINE/INVALID_PARAMS');
    expect((missing.error.data?.issues ?? []).map((i) => (i as { keyword: string }).keyword)).to.deep.equal(['required']);

    const extra = (await send(handler, machine, {
      jsonrpc: '2.0',
      id: 6,
      method: 'resources/read',
      params: { uri: 'memo://readme', extra: true },
    })) as ErrorReply;
    expect(extra.error.code).to.equal(-32602);
    expect((extra.error.data?.issues ?? []).map((i) => (i as { keyword: string }).keyword)).to.deep.equal([
      'additionalProperties',
    ]);
  });

  it('answers an unknown URI with resource not found', async () => {
    const handler = createTestHandler({ resourceRegistry: memoRegistry() });
    const machine = createTestMachine();
    await handshake(handler, machine);

    expect(
      await send(handler, machine, { jsonrpc: '2.0', id: 7, method: 'resources/read', params: { uri: 'memo://notes/8' } }),
    ).to.deep.equal({
      jsonrpc: '2.0',
      id: 7,
      error: {
        code: -32602,
        message: 'Resource not found',
        data: { code: 'MCP_SESSION_ENGINE/RESOURCE_NOT_FOUND', uri: 'memo://notes/8' },
      },
    });
  });

  it('gates resource methods on the handshake', async () => {
    const handler = createTestHandler({ resourceRegistry: memoRegistry() });
    const machine = createTestMachine();

    const res = (await send(handler, machine, { jsonrpc: '2.0', id: 8, method: 'resources/list' })) as ErrorReply;
    expect(res.error.code).to.equal(-32600);
    expect(res.error.message).to.equal('Not initialized');
  });

  it('treats resource methods as unknown without a registry', async () => {
    const handler = createTestHandler();
    const machine = createTestMachine();
    await handshake(handler, machine);

    expect(await send(handler, machine, { jsonrpc: '2.0', id: 9, method: 'resources/list' })).to.deep.equal({
      jsonrpc: '2.0',
      id: 9,
      error: { code: -32601, message: 'Method not found' },
    });
  });
});

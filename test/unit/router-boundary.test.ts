import { EventEmitter } from 'node:events';
import type * as http from 'node:http';
import { expect } from 'chai';
import { NOOP_LOGGER } from '../../src/logging/redact.js';
import {
  createRouter,
  MAX_REQUEST_BYTES,
  type McpDeleteHandler,
  type McpPostHandler,
  type RouterDeps,
} from '../../src/server/router.js';

const JSON_HEADERS = { 'Content-Type': 'application/json', Accept: 'application/json' } as const;

class MockRequest extends EventEmitter {
  public method = 'POST';
  public url = '/mcp';
  public headers: http.IncomingHttpHeaders = {};

  public destroy(): void {
    this.emit('close');
  }
}

class MockResponse {
  public statusCode = 0;
  public headersSent = false;
  public writableEnded = false;
  public headers: Record<string, string> = {};
  public bodyText: string | undefined;

  private resolveDone!: () => void;
  public done = new Promise<void>((resolve) => {
    this.resolveDone = resolve;
  });

  public setHeader(key: string, value: string): void {
    this.headers[key.toLowerCase()] = value;
  }

  public end(body?: string): void {
    this.headersSent = true;
    this.writableEnded = true;
    this.bodyText = body;
    this.resolveDone();
  }
}

type Invocation = Readonly<{
  method?: string;
  url?: string;
  headers?: Record<string, string>;
  body?: string;
}>;

async function invoke(
  listener: http.RequestListener,
  inv: Invocation,
): Promise<{ status: number; headers: Record<string, string>; bodyText: string | undefined }> {
  const req = new MockRequest();
  req.method = inv.method ?? 'POST';
  req.url = inv.url ?? '/mcp';
  req.headers = Object.fromEntries(Object.entries(inv.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]));
  const res = new MockResponse();

  listener(req as unknown as http.IncomingMessage, res as unknown as http.ServerResponse);

  if (inv.body) req.emit('data', Buffer.from(inv.body, 'utf8'));
  req.emit('end');

  await res.done;
  return { status: res.statusCode, headers: res.headers, bodyText: res.bodyText };
}

function router(overrides: Partial<RouterDeps> = {}): http.RequestListener {
  return createRouter({
    endpointPath: '/mcp',
    maxRequestBytes: MAX_REQUEST_BYTES,
    logger: NOOP_LOGGER,
    onMcpPost: () => ({ status: 202 }),
    ...overrides,
  });
}

describe('router boundary', () => {
  it('answers other paths with 404', async () => {
    const res = await invoke(router(), { url: '/other', headers: JSON_HEADERS, body: '{}' });
    expect(res.status).to.equal(404);
  });

  it('ignores the query string when matching the endpoint', async () => {
    const res = await invoke(router(), { url: '/mcp?x=1', headers: JSON_HEADERS, body: '{}' });
    expect(res.status).to.equal(202);
  });

  it('answers other methods with 405 and an Allow header', async () => {
    const res = await invoke(router(), { method: 'GET' });
    expect(res.status).to.equal(405);
    expect(res.headers['allow']).to.equal('POST');

    const onMcpDelete: McpDeleteHandler = () => ({ status: 204 });
    const withDelete = await invoke(router({ onMcpDelete }), { method: 'PUT' });
    expect(withDelete.status).to.equal(405);
    expect(withDelete.headers['allow']).to.equal('POST, DELETE');
  });

  it('rejects non-JSON content with 415', async () => {
    const res = await invoke(router(), {
      headers: { 'Content-Type': 'text/plain', Accept: 'application/json' },
      body: '{}',
    });
    expect(res.status).to.equal(415);
  });

  it('accepts a JSON content type with parameters', async () => {
    const res = await invoke(router(), {
      headers: { 'Content-Type': 'application/json; charset=utf-8', Accept: '*/*' },
      body: '{}',
    });
    expect(res.status).to.equal(202);
  });

  it('rejects clients that do not accept JSON with 406', async () => {
    const res = await invoke(router(), {
      headers: { 'Content-Type': 'application/json', Accept: 'text/html' },
      body: '{}',
    });
    expect(res.status).to.equal(406);
  });

  it('rejects a declared oversize body with 413', async () => {
    const res = await invoke(router({ maxRequestBytes: 8 }), {
      headers: { ...JSON_HEADERS, 'Content-Length': '100' },
    });
    expect(res.status).to.equal(413);
  });

  it('rejects a streamed oversize body with 413 without calling the handler', async () => {
    let called = false;
    const onMcpPost: McpPostHandler = () => {
      called = true;
      return { status: 202 };
    };
    const res = await invoke(router({ maxRequestBytes: 8, onMcpPost }), {
      headers: JSON_HEADERS,
      body: '{"padding":"xxxxxxxx"}',
    });
    expect(res.status).to.equal(413);
    expect(called).to.equal(false);
  });

  it('passes only allowlisted headers and the body to the handler', async () => {
    let seen: { headers: Record<string, string>; bodyText: string; bodyBytes: number } | undefined;
    const onMcpPost: McpPostHandler = (ctx) => {
      seen = { headers: { ...ctx.headers }, bodyText: ctx.bodyText, bodyBytes: ctx.bodyBytes };
      return { status: 202 };
    };

    const res = await invoke(router({ onMcpPost }), {
      headers: {
        ...JSON_HEADERS,
        Authorization: 'Bearer test-secret',
        'MCP-Session-Id': 'session-123',
        'MCP-Protocol-Version': '2025-06-18',
      },
      body: '{"a":"é"}',
    });
    expect(res.status).to.equal(202);
    expect(res.bodyText).to.equal(undefined);
    expect(seen).to.deep.equal({
      headers: { 'mcp-protocol-version': '2025-06-18', 'mcp-session-id': 'session-123' },
      bodyText: '{"a":"é"}',
      bodyBytes: 10,
    });
  });

  it('writes JSON bodies for 200 results with the handler headers', async () => {
    const onMcpPost: McpPostHandler = () => ({
      status: 200,
      headers: { 'MCP-Session-Id': 'abc' },
      bodyText: '{"jsonrpc":"2.0","id":1,"result":{}}',
    });
    const res = await invoke(router({ onMcpPost }), { headers: JSON_HEADERS, body: '{}' });
    expect(res.status).to.equal(200);
    expect(res.headers['content-type']).to.equal('application/json');
    expect(res.headers['mcp-session-id']).to.equal('abc');
    expect(res.bodyText).to.equal('{"jsonrpc":"2.0","id":1,"result":{}}');
  });

  it('answers a throwing handler with 500', async () => {
    const onMcpPost: McpPostHandler = () => {
      throw new Error('boom');
    };
    const res = await invoke(router({ onMcpPost }), { headers: JSON_HEADERS, body: '{}' });
    expect(res.status).to.equal(500);
    expect(res.bodyText).to.equal(undefined);
  });

  it('forwards DELETE to the session terminator', async () => {
    let seen: Record<string, string> | undefined;
    const onMcpDelete: McpDeleteHandler = (ctx) => {
      seen = { ...ctx.headers };
      return { status: 204 };
    };
    const res = await invoke(router({ onMcpDelete }), {
      method: 'DELETE',
      headers: { 'MCP-Session-Id': 'session-123' },
    });
    expect(res.status).to.equal(204);
    expect(seen).to.deep.equal({ 'mcp-session-id': 'session-123' });
  });
});

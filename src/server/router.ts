// src/server/router.ts
//
// HTTP boundary for the MCP endpoint. Everything that can be decided from the request line and
// headers is decided here, before the body is read; the body is buffered up to a hard cap and then
// handed to the endpoint callbacks. Failures at this layer are status-only responses.

import type * as http from 'node:http';
import { redactHeaders, type Logger } from '../logging/redact.js';

export const MAX_REQUEST_BYTES = 1024 * 1024;

export type McpPostContext = Readonly<{
  pathname: string;
  headers: Readonly<Record<string, string>>;
  bodyText: string;
  bodyBytes: number;
}>;

export type McpPostResult = Readonly<{
  status: number;
  headers?: Readonly<Record<string, string>>;
  bodyText?: string;
}>;

export type McpPostHandler = (ctx: McpPostContext) => Promise<McpPostResult> | McpPostResult;

export type McpDeleteContext = Readonly<{
  pathname: string;
  headers: Readonly<Record<string, string>>;
}>;

/** Explicit session termination (DELETE on the endpoint). */
export type McpDeleteHandler = (ctx: McpDeleteContext) => McpPostResult;

export type RouterDeps = Readonly<{
  endpointPath: string;
  maxRequestBytes: number;
  logger: Logger;
  onMcpPost?: McpPostHandler;
  onMcpDelete?: McpDeleteHandler;
}>;

// Only protocol headers reach the endpoint; credentials and cookies never leave this layer.
const FORWARDED_HEADERS = ['mcp-protocol-version', 'mcp-session-id'] as const;

type BodyResult = Readonly<{ ok: true; text: string; bytes: number }> | Readonly<{ ok: false; status: 400 | 413 }>;

export function createRouter(deps: RouterDeps): http.RequestListener {
  const allow = deps.onMcpDelete ? 'POST, DELETE' : 'POST';

  return (req, res) => {
    const pathname = (req.url ?? '').split('?')[0] ?? '';
    if (pathname !== deps.endpointPath) {
      respond(res, { status: 404 });
      return;
    }

    const method = (req.method ?? '').toUpperCase();
    if (method === 'DELETE' && deps.onMcpDelete) {
      respond(res, deps.onMcpDelete({ pathname, headers: forwardedHeaders(req.headers) }));
      return;
    }
    if (method !== 'POST') {
      respond(res, { status: 405, headers: { Allow: allow } });
      return;
    }

    const rejected = checkPostHeaders(req.headers, deps.maxRequestBytes);
    if (rejected !== undefined) {
      deps.logger.debug('Rejected request before reading the body.', {
        status: rejected,
        headers: redactHeaders(req.headers),
      });
      respond(res, { status: rejected });
      if (rejected === 413) req.destroy();
      return;
    }

    handlePost(deps, req, pathname).then(
      (result) => respond(res, result),
      (err: unknown) => {
        deps.logger.error('MCP handler threw; returning 500.', {
          error: err instanceof Error ? err.message : String(err),
        });
        respond(res, { status: 500 });
      },
    );
  };
}

async function handlePost(deps: RouterDeps, req: http.IncomingMessage, pathname: string): Promise<McpPostResult> {
  const body = await readBody(req, deps.maxRequestBytes);
  if (!body.ok) {
    if (body.status === 413) deps.logger.debug('Payload exceeded limit; returning 413.', { max: deps.maxRequestBytes });
    return { status: body.status };
  }
  if (!deps.onMcpPost) return { status: 500 };

  return await deps.onMcpPost({
    pathname,
    headers: forwardedHeaders(req.headers),
    bodyText: body.text,
    bodyBytes: body.bytes,
  });
}

/** Status to answer with before reading the body, or undefined when the request may proceed. */
function checkPostHeaders(headers: http.IncomingHttpHeaders, maxRequestBytes: number): 413 | 415 | 406 | undefined {
  if (mediaTypes(headers['content-type'])[0] !== 'application/json') return 415;

  // Replies are always a single JSON document; there is no event stream.
  const accepted = mediaTypes(headers['accept']);
  if (!accepted.some((t) => t === 'application/json' || t === 'application/*' || t === '*/*')) return 406;

  const declared = Number.parseInt(joined(headers['content-length']) ?? '', 10);
  if (Number.isFinite(declared) && declared > maxRequestBytes) return 413;
  return undefined;
}

function readBody(req: http.IncomingMessage, maxBytes: number): Promise<BodyResult> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let total = 0;

    const finish = (result: BodyResult) => {
      req.off('data', onData);
      req.off('end', onEnd);
      req.off('error', onError);
      resolve(result);
    };
    const onData = (chunk: Buffer) => {
      total += chunk.length;
      if (total > maxBytes) {
        finish({ ok: false, status: 413 });
        req.destroy();
        return;
      }
      chunks.push(chunk);
    };
    const onEnd = () => finish({ ok: true, text: Buffer.concat(chunks, total).toString('utf8'), bytes: total });
    const onError = () => finish({ ok: false, status: 400 });

    req.on('data', onData);
    req.on('end', onEnd);
    req.on('error', onError);
  });
}

function respond(res: http.ServerResponse, result: McpPostResult): void {
  if (res.headersSent) return;
  for (const [k, v] of Object.entries(result.headers ?? {})) res.setHeader(k, v);

  // Only JSON-RPC replies carry a body.
  const body = result.status === 200 ? result.bodyText : undefined;
  if (body !== undefined && !Object.keys(result.headers ?? {}).some((k) => k.toLowerCase() === 'content-type')) {
    res.setHeader('Content-Type', 'application/json');
  }
  res.statusCode = result.status;
  res.end(body);
}

function forwardedHeaders(headers: http.IncomingHttpHeaders): Record<string, string> {
  const out: Record<string, string> = {};
  for (const name of FORWARDED_HEADERS) {
    const value = joined(headers[name]);
    if (value !== undefined) out[name] = value;
  }
  return out;
}

function joined(h: string | string[] | undefined): string | undefined {
  if (h === undefined) return undefined;
  return Array.isArray(h) ? h.join(',') : h;
}

/** Lower-cased media types of a Content-Type or Accept header, parameters dropped. */
function mediaTypes(h: string | string[] | undefined): string[] {
  return (joined(h) ?? '')
    .split(',')
    .map((part) => (part.split(';')[0] ?? '').trim().toLowerCase())
    .filter((t) => t.length > 0);
}

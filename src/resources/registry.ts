// src/resources/registry.ts
//
// Resource registry behind resources/list, resources/templates/list and resources/read.
//
// - Static resources are matched by exact URI; templates are tried afterwards, in registration order,
//   and the first template that matches owns the URI.
// - A template holds `{name}` placeholders. A placeholder matches one path segment, except a trailing
//   one, which takes the rest of the URI (so `file:///{path}` matches nested paths).
// - Lists come back in registration order.

import { JSONRPC_INVALID_PARAMS, jsonRpcError, type JsonRpcErrorObject } from '../mcp/errors.js';

export const ERROR_CODE_RESOURCE_NOT_FOUND = 'MCP_SESSION_ENGINE/RESOURCE_NOT_FOUND' as const;

export type ResourceDescriptor = Readonly<{
  uri: string;
  name: string;
  description?: string;
  mimeType: string;
}>;

export type ResourceTemplateDescriptor = Readonly<{
  uriTemplate: string;
  name: string;
  title?: string;
  description?: string;
  mimeType?: string;
}>;

/** Text is sent as `text`; bytes are sent base64-encoded as `blob`. */
export type ResourceBody = string | Uint8Array;

export type ResourceReader = () => ResourceBody | Promise<ResourceBody>;

/** Resolves to undefined when the parameters name nothing readable. */
export type TemplateReader = (
  params: Readonly<Record<string, string>>,
  uri: string,
) => ResourceBody | undefined | Promise<ResourceBody | undefined>;

export type ResourceContents =
  | Readonly<{ uri: string; mimeType: string; text: string }>
  | Readonly<{ uri: string; mimeType: string; blob: string }>;

export type ResourcesReadResult = Readonly<{ contents: readonly ResourceContents[] }>;

export type ReadResourceResult =
  | Readonly<{ ok: true; result: ResourcesReadResult }>
  | Readonly<{ ok: false; error: JsonRpcErrorObject }>;

type RegisteredResource = Readonly<{ descriptor: ResourceDescriptor; read: ResourceReader }>;

type RegisteredTemplate = Readonly<{
  descriptor: ResourceTemplateDescriptor;
  pattern: RegExp;
  paramNames: readonly string[];
  read: TemplateReader;
}>;

const DEFAULT_MIME_TYPE = 'text/plain';
const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export class ResourceRegistry {
  private readonly resources = new Map<string, RegisteredResource>();
  private readonly templates = new Map<string, RegisteredTemplate>();

  public get size(): number {
    return this.resources.size + this.templates.size;
  }

  /** Register a static resource. Returns false when the URI is already taken. */
  public addResource(
    descriptor: Omit<ResourceDescriptor, 'mimeType'> & { mimeType?: string },
    content: ResourceBody | ResourceReader,
  ): boolean {
    if (this.resources.has(descriptor.uri)) return false;
    const read = typeof content === 'function' ? content : constant(content);
    this.resources.set(descriptor.uri, {
      descriptor: { ...descriptor, mimeType: descriptor.mimeType ?? DEFAULT_MIME_TYPE },
      read,
    });
    return true;
  }

  /** Register a URI template. Returns false when the name is already taken. Throws on a template without placeholders. */
  public addTemplate(descriptor: ResourceTemplateDescriptor, read: TemplateReader): boolean {
    if (this.templates.has(descriptor.name)) return false;
    const compiled = compileUriTemplate(descriptor.uriTemplate);
    if (compiled.paramNames.length === 0) {
      throw new Error(`Resource template has no {param} placeholder: ${descriptor.uriTemplate}`);
    }
    this.templates.set(descriptor.name, { descriptor: { ...descriptor }, ...compiled, read });
    return true;
  }

  public list(): readonly ResourceDescriptor[] {
    return [...this.resources.values()].map((r) => r.descriptor);
  }

  public listTemplates(): readonly ResourceTemplateDescriptor[] {
    return [...this.templates.values()].map((t) => t.descriptor);
  }

  public async read(uri: string): Promise<ReadResourceResult> {
    const resource = this.resources.get(uri);
    if (resource) {
      const body = await resource.read();
      return { ok: true, result: { contents: [toContents(uri, resource.descriptor.mimeType, body)] } };
    }

    for (const template of this.templates.values()) {
      const params = matchTemplate(template, uri);
      if (!params) continue;
      const body = await template.read(params, uri);
      if (body === undefined) break;
      const mimeType = template.descriptor.mimeType ?? DEFAULT_MIME_TYPE;
      return { ok: true, result: { contents: [toContents(uri, mimeType, body)] } };
    }

    return notFound(uri);
  }
}

function notFound(uri: string): ReadResourceResult {
  return {
    ok: false,
    error: jsonRpcError(JSONRPC_INVALID_PARAMS, 'Resource not found', { code: ERROR_CODE_RESOURCE_NOT_FOUND, uri }),
  };
}

export function compileUriTemplate(uriTemplate: string): Readonly<{ pattern: RegExp; paramNames: string[] }> {
  const paramNames: string[] = [];
  let source = '';
  let last = 0;
  for (const m of uriTemplate.matchAll(PLACEHOLDER)) {
    const index = m.index ?? 0;
    source += escapeRegExp(uriTemplate.slice(last, index));
    last = index + m[0].length;
    source += last === uriTemplate.length ? '(.+)' : '([^/]+)';
    paramNames.push(m[1] ?? '');
  }
  source += escapeRegExp(uriTemplate.slice(last));
  return { pattern: new RegExp(`^${source}$`), paramNames };
}

function matchTemplate(template: RegisteredTemplate, uri: string): Record<string, string> | undefined {
  const m = template.pattern.exec(uri);
  if (!m) return undefined;
  const params: Record<string, string> = {};
  template.paramNames.forEach((name, i) => {
    params[name] = m[i + 1] ?? '';
  });
  return params;
}

function toContents(uri: string, mimeType: string, body: ResourceBody): ResourceContents {
  if (typeof body === 'string') return { uri, mimeType, text: body };
  return { uri, mimeType, blob: Buffer.from(body).toString('base64') };
}

function constant(body: ResourceBody): ResourceReader {
  return () => body;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// src/mcp/capabilities.ts
//
// Capability flag sets for both peers.
//
// Merge rule: per-flag logical OR. A capability is set in the merged value when either the target or
// the source grants it. This is how a server's defaults combine with an override set, and how the
// negotiated client subset is folded into the session.

import { isRecord } from '../util/json.js';

export type ServerCapabilities = Readonly<{
  tools: boolean;
  resources: boolean;
  prompts: boolean;
  logging: boolean;
}>;

export type ClientCapabilities = Readonly<{
  roots: boolean;
  sampling: boolean;
}>;

export type Capabilities = Readonly<{
  server: ServerCapabilities;
  client: ClientCapabilities;
}>;

/** All flags false. */
export function createCapabilities(): Capabilities {
  return {
    server: { tools: false, resources: false, prompts: false, logging: false },
    client: { roots: false, sampling: false },
  };
}

/** Server defaults before any features are registered: logging only. */
export function defaultServerCapabilities(): Capabilities {
  const base = createCapabilities();
  return { ...base, server: { ...base.server, logging: true } };
}

export function mergeCapabilities(target: Capabilities, source: Capabilities): Capabilities {
  return {
    server: {
      tools: target.server.tools || source.server.tools,
      resources: target.server.resources || source.server.resources,
      prompts: target.server.prompts || source.server.prompts,
      logging: target.server.logging || source.server.logging,
    },
    client: {
      roots: target.client.roots || source.client.roots,
      sampling: target.client.sampling || source.client.sampling,
    },
  };
}

export function capabilitiesEqual(a: Capabilities, b: Capabilities): boolean {
  return (
    a.server.tools === b.server.tools &&
    a.server.resources === b.server.resources &&
    a.server.prompts === b.server.prompts &&
    a.server.logging === b.server.logging &&
    a.client.roots === b.client.roots &&
    a.client.sampling === b.client.sampling
  );
}

/**
 * Client capabilities as sent in `initialize` params (MCP wire shape). `sampling` is declared by the
 * presence of its object; `roots` only counts when it sets `listChanged: true`. The payload is
 * expected to be schema-validated already.
 */
export function clientCapabilitiesFromWire(wire: unknown): Capabilities {
  const base = createCapabilities();
  if (!isRecord(wire)) return base;
  return {
    ...base,
    client: {
      roots: isRecord(wire.roots) && wire.roots.listChanged === true,
      sampling: isRecord(wire.sampling),
    },
  };
}

/** Server capabilities in the MCP wire shape used by the `initialize` result. */
export function serverCapabilitiesToWire(caps: Capabilities): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  if (caps.server.prompts) out.prompts = { listChanged: true };
  if (caps.server.resources) out.resources = { subscribe: false, listChanged: true };
  if (caps.server.tools) out.tools = { listChanged: true };
  if (caps.server.logging) out.logging = {};
  return out;
}

/** Flat `{server, client}` view, as stored in session snapshots. */
export function capabilitiesToJson(caps: Capabilities): Record<string, unknown> {
  return {
    server: { ...caps.server },
    client: { ...caps.client },
  };
}

/**
 * Inverse of capabilitiesToJson. A flag is set when its member is present and not `false`; missing
 * groups leave their flags cleared. Returns undefined for non-object input.
 */
export function capabilitiesFromJson(json: unknown): Capabilities | undefined {
  if (!isRecord(json)) return undefined;
  const server = isRecord(json.server) ? json.server : {};
  const client = isRecord(json.client) ? json.client : {};
  return {
    server: {
      tools: flag(server.tools),
      resources: flag(server.resources),
      prompts: flag(server.prompts),
      logging: flag(server.logging),
    },
    client: {
      roots: flag(client.roots),
      sampling: flag(client.sampling),
    },
  };
}

function flag(v: unknown): boolean {
  return v !== undefined && v !== null && v !== false;
}

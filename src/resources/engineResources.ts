// src/resources/engineResources.ts
//
// Resources the engine itself publishes: server identity and the input schema of each tool.

import type { PeerInfo } from '../mcp/sessionInfo.js';
import { isToolName } from '../tools/catalog.js';
import type { SchemaRegistry } from '../tools/schemaRegistry.js';
import { stableJson } from '../util/json.js';
import { ResourceRegistry } from './registry.js';

export const SERVER_INFO_URI = 'mcp-session-engine://server/info';
export const TOOL_SCHEMA_URI_TEMPLATE = 'mcp-session-engine://tools/{name}/input-schema';

export type EngineResourcesDeps = Readonly<{
  serverInfo: PeerInfo;
  supportedVersions: readonly string[];
  schemaRegistry: SchemaRegistry;
}>;

export function createEngineResources(deps: EngineResourcesDeps): ResourceRegistry {
  const registry = new ResourceRegistry();

  registry.addResource(
    {
      uri: SERVER_INFO_URI,
      name: 'server-info',
      description: 'Server name, version and supported protocol versions.',
      mimeType: 'application/json',
    },
    stableJson({ ...deps.serverInfo, protocolVersions: [...deps.supportedVersions] }),
  );

  registry.addTemplate(
    {
      uriTemplate: TOOL_SCHEMA_URI_TEMPLATE,
      name: 'tool-input-schema',
      title: 'Tool input schema',
      description: 'JSON Schema for the arguments of one tool.',
      mimeType: 'application/schema+json',
    },
    ({ name }) =>
      name !== undefined && isToolName(name) ? stableJson(deps.schemaRegistry.getInputSchema(name)) : undefined,
  );

  return registry;
}

// src/mcp/sessionInfo.ts
//
// Negotiated session metadata owned by one ProtocolStateMachine.

import { capabilitiesToJson, createCapabilities, type Capabilities } from './capabilities.js';

export type PeerInfo = Readonly<{
  name: string;
  version: string;
}>;

export type SessionInfo = Readonly<{
  protocolVersion: string | undefined;
  capabilities: Capabilities;
  clientInfo: PeerInfo | undefined;
  serverInfo: PeerInfo | undefined;
  /** Epoch ms when notifications/initialized completed the handshake; 0 until then. */
  initializedAtMs: number;
  /** Epoch ms of the last accepted event; 0 until the first one. */
  lastActivityMs: number;
}>;

export function createSessionInfo(): SessionInfo {
  return {
    protocolVersion: undefined,
    capabilities: createCapabilities(),
    clientInfo: undefined,
    serverInfo: undefined,
    initializedAtMs: 0,
    lastActivityMs: 0,
  };
}

export function sessionInfoToJson(info: SessionInfo): Record<string, unknown> {
  return {
    ...(info.protocolVersion !== undefined ? { protocolVersion: info.protocolVersion } : {}),
    capabilities: capabilitiesToJson(info.capabilities),
    clientInfo: info.clientInfo ? { ...info.clientInfo } : {},
    serverInfo: info.serverInfo ? { ...info.serverInfo } : {},
    initializedTime: info.initializedAtMs,
    lastActivity: info.lastActivityMs,
  };
}

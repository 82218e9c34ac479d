// src/mcp/protocolState.ts
//
// Session lifecycle state machine.
//
//   uninitialized --initializeRequest--> initializing --initializeResponse--> initialized
//   initialized --initializedNotification--> ready --(request|notification|response)--> ready
//   any non-terminal --error--> error            any --shutdown--> shutdown (terminal)
//
// The legality matrix lives in TRANSITIONS; nothing else decides whether an event is allowed.
// One instance per logical session. Not synchronized: callers serialize access.

import {
  MCP_INVALID_CAPABILITIES,
  MCP_INVALID_PROTOCOL_STATE,
  MCP_UNSUPPORTED_PROTOCOL_VERSION,
} from './errors.js';
import {
  clientCapabilitiesFromWire,
  defaultServerCapabilities,
  mergeCapabilities,
  type Capabilities,
} from './capabilities.js';
import { createSessionInfo, sessionInfoToJson, type PeerInfo, type SessionInfo } from './sessionInfo.js';
import { ProtocolSchemas, type SessionPayloadValidator } from './protocolSchemas.js';
import type { Logger } from '../logging/redact.js';
import { isRecord } from '../util/json.js';

export const PROTOCOL_STATES = [
  'uninitialized',
  'initializing',
  'initialized',
  'ready',
  'error',
  'shutdown',
] as const;
export type ProtocolState = (typeof PROTOCOL_STATES)[number];

export const PROTOCOL_EVENTS = [
  'initializeRequest',
  'initializeResponse',
  'initializedNotification',
  'request',
  'response',
  'notification',
  'error',
  'shutdown',
] as const;
export type ProtocolEvent = (typeof PROTOCOL_EVENTS)[number];

/** Newest first; the first entry is offered when a client asks for an unsupported version. */
export const SUPPORTED_PROTOCOL_VERSIONS = ['2025-06-18', '2025-03-26'] as const;
export const LATEST_PROTOCOL_VERSION = SUPPORTED_PROTOCOL_VERSIONS[0];

export const TRANSITIONS: Readonly<Record<ProtocolState, Readonly<Partial<Record<ProtocolEvent, ProtocolState>>>>> = {
  uninitialized: { initializeRequest: 'initializing', error: 'error', shutdown: 'shutdown' },
  initializing: { initializeResponse: 'initialized', error: 'error', shutdown: 'shutdown' },
  initialized: { initializedNotification: 'ready', error: 'error', shutdown: 'shutdown' },
  ready: {
    request: 'ready',
    notification: 'ready',
    response: 'ready',
    error: 'error',
    shutdown: 'shutdown',
  },
  error: { error: 'error', shutdown: 'shutdown' },
  shutdown: { shutdown: 'shutdown' },
};

export function nextState(from: ProtocolState, event: ProtocolEvent): ProtocolState | undefined {
  return TRANSITIONS[from][event];
}

export function isTerminalState(state: ProtocolState): boolean {
  return state === 'shutdown';
}

export type SessionResult =
  | Readonly<{ ok: true }>
  | Readonly<{ ok: false; code: number; message: string; data?: unknown }>;

export type TransitionListener = (from: ProtocolState, to: ProtocolState, event: ProtocolEvent) => void;

export type ProtocolStateMachineOptions = Readonly<{
  /** Illegal transitions force the `error` state (handshake replays excepted). Default: true. */
  strictMode?: boolean;
  /** Advisory cap on in-flight requests per session. Default: 100. */
  maxPendingRequests?: number;
  /** Advisory timeout the transport polls and enforces. Default: 30 000 ms. */
  requestTimeoutMs?: number;
  supportedVersions?: readonly string[];
  /** Server capability defaults merged into every session. Default: logging only. */
  serverCapabilities?: Capabilities;
  serverInfo?: PeerInfo;
  validator?: SessionPayloadValidator;
  logger?: Logger;
  onTransition?: TransitionListener;
  /** Injectable clock for tests; default is Date.now. */
  nowMs?: () => number;
}>;

export class ProtocolStateMachine {
  public readonly strictMode: boolean;
  public readonly maxPendingRequests: number;
  public readonly requestTimeoutMs: number;

  private current: ProtocolState = 'uninitialized';
  private previous: ProtocolState = 'uninitialized';
  private session: SessionInfo = createSessionInfo();
  private enteredAtMs: number;
  private transitions = 0;
  private errorCode = 0;
  private errorMessage: string | undefined;

  private readonly supportedVersions: readonly string[];
  private readonly serverCapabilities: Capabilities;
  private readonly serverInfo: PeerInfo | undefined;
  private readonly validator: SessionPayloadValidator | undefined;
  private readonly logger: Logger | undefined;
  private readonly onTransition: TransitionListener | undefined;
  private readonly nowMs: () => number;

  public constructor(opts: ProtocolStateMachineOptions = {}) {
    this.strictMode = opts.strictMode ?? true;
    this.maxPendingRequests = opts.maxPendingRequests ?? 100;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? 30_000;
    this.supportedVersions = opts.supportedVersions ?? SUPPORTED_PROTOCOL_VERSIONS;
    this.serverCapabilities = opts.serverCapabilities ?? defaultServerCapabilities();
    this.serverInfo = opts.serverInfo;
    this.validator = opts.validator;
    this.logger = opts.logger;
    this.onTransition = opts.onTransition;
    this.nowMs = opts.nowMs ?? (() => Date.now());
    this.enteredAtMs = this.nowMs();
  }

  // --- queries --------------------------------------------------------------

  public get currentState(): ProtocolState {
    return this.current;
  }

  public get previousState(): ProtocolState {
    return this.previous;
  }

  public get sessionInfo(): SessionInfo {
    return this.session;
  }

  public get stateEnteredAtMs(): number {
    return this.enteredAtMs;
  }

  public get transitionCount(): number {
    return this.transitions;
  }

  public get lastErrorCode(): number {
    return this.errorCode;
  }

  public get lastErrorMessage(): string | undefined {
    return this.errorMessage;
  }

  public isReady(): boolean {
    return this.current === 'ready';
  }

  public isInitialized(): boolean {
    return this.current === 'initialized' || this.current === 'ready';
  }

  public canHandleRequests(): boolean {
    return this.isReady();
  }

  public isProtocolVersionSupported(version: string): boolean {
    return this.supportedVersions.includes(version);
  }

  public getSupportedVersions(): readonly string[] {
    return this.supportedVersions;
  }

  // --- transitions ----------------------------------------------------------

  public canTransition(event: ProtocolEvent): boolean {
    return nextState(this.current, event) !== undefined;
  }

  /**
   * Apply an event. Returns false for an illegal event; in strict mode a sequencing error is recorded
   * and the machine is forced into `error`, except when already shut down or when the event replays
   * the handshake on an initialized session, which keeps its state.
   */
  public transition(event: ProtocolEvent): boolean {
    const to = nextState(this.current, event);
    if (to === undefined) {
      const message = `Illegal event ${eventToString(event)} in state ${stateToString(this.current)}`;
      this.logger?.debug('Rejected protocol event.', { state: this.current, event });
      if (this.strictMode) {
        this.setError(MCP_INVALID_PROTOCOL_STATE, message);
        const replay = event === 'initializeRequest' && this.isInitialized();
        if (!replay && !isTerminalState(this.current)) this.enter('error', 'error');
      }
      return false;
    }
    this.enter(to, event);
    return true;
  }

  // --- session --------------------------------------------------------------

  /**
   * Begin the handshake: validate the requested version and client payloads, negotiate
   * capabilities, then fire `initializeRequest`. On failure the state is left unchanged.
   */
  public initializeSession(version: string, clientCapabilities: unknown, clientInfo: unknown): SessionResult {
    if (this.current !== 'uninitialized') {
      return fail(
        MCP_INVALID_PROTOCOL_STATE,
        `initialize is only valid in state ${stateToString('uninitialized')} (current: ${stateToString(this.current)})`,
      );
    }

    if (!this.isProtocolVersionSupported(version)) {
      return fail(MCP_UNSUPPORTED_PROTOCOL_VERSION, `Unsupported protocol version: ${version}`, {
        supported: [...this.supportedVersions],
        requested: version,
      });
    }

    const validator = this.validator ?? ProtocolSchemas.getOrCreate();

    const capsCheck = validator.checkClientCapabilities(clientCapabilities ?? {});
    if (!capsCheck.ok) {
      return fail(MCP_INVALID_CAPABILITIES, 'Malformed client capabilities', { issues: capsCheck.issues });
    }

    let peer: PeerInfo | undefined;
    if (clientInfo !== undefined) {
      const infoCheck = validator.checkPeerInfo(clientInfo);
      if (!infoCheck.ok || !isRecord(clientInfo)) {
        return fail(MCP_INVALID_CAPABILITIES, 'Malformed client info', {
          issues: infoCheck.ok ? [] : infoCheck.issues,
        });
      }
      peer = { name: String(clientInfo.name), version: String(clientInfo.version) };
    }

    const negotiated = clientCapabilitiesFromWire(clientCapabilities);
    const now = this.nowMs();

    this.session = {
      ...this.session,
      protocolVersion: version,
      capabilities: mergeCapabilities(this.serverCapabilities, negotiated),
      clientInfo: peer,
      serverInfo: this.serverInfo,
      lastActivityMs: now,
    };

    this.transition('initializeRequest');
    return { ok: true };
  }

  /** Mark the initialize response as sent (`initializing` -> `initialized`). */
  public completeInitializeResponse(): SessionResult {
    if (!this.transition('initializeResponse')) {
      return fail(MCP_INVALID_PROTOCOL_STATE, `No initialize in progress (state: ${stateToString(this.current)})`);
    }
    return { ok: true };
  }

  /** Handle notifications/initialized (`initialized` -> `ready`), stamping the initialization time. */
  public finalizeInitialization(): SessionResult {
    if (this.current !== 'initialized') {
      return fail(
        MCP_INVALID_PROTOCOL_STATE,
        `initialized notification is only valid in state ${stateToString('initialized')} (current: ${stateToString(this.current)})`,
      );
    }
    if (!this.transition('initializedNotification')) {
      return fail(MCP_INVALID_PROTOCOL_STATE, 'Could not complete initialization');
    }
    this.session = { ...this.session, initializedAtMs: this.nowMs() };
    return { ok: true };
  }

  /** Return to `uninitialized` from any state and forget everything negotiated. */
  public resetSession(): void {
    this.current = 'uninitialized';
    this.previous = 'uninitialized';
    this.enteredAtMs = this.nowMs();
    this.transitions = 0;
    this.session = createSessionInfo();
    this.clearError();
  }

  public touch(): void {
    this.session = { ...this.session, lastActivityMs: this.nowMs() };
  }

  // --- errors ---------------------------------------------------------------

  /** Record an error. Does not change state; fire the `error` event separately if needed. */
  public setError(code: number, message: string): void {
    this.errorCode = code;
    this.errorMessage = message;
  }

  public clearError(): void {
    this.errorCode = 0;
    this.errorMessage = undefined;
  }

  public hasError(): boolean {
    return this.errorCode !== 0;
  }

  public snapshot(): Record<string, unknown> {
    return {
      state: this.current,
      previousState: this.previous,
      transitionCount: this.transitions,
      stateEnteredAt: this.enteredAtMs,
      ...(this.hasError() ? { lastError: { code: this.errorCode, message: this.errorMessage ?? '' } } : {}),
      session: sessionInfoToJson(this.session),
    };
  }

  private enter(to: ProtocolState, event: ProtocolEvent): void {
    const from = this.current;
    const now = this.nowMs();
    this.previous = from;
    this.current = to;
    this.enteredAtMs = now;
    this.transitions += 1;
    this.session = { ...this.session, lastActivityMs: now };
    this.onTransition?.(from, to, event);
  }
}

export function stateToString(state: ProtocolState): string {
  return state.toUpperCase();
}

export function eventToString(event: ProtocolEvent): string {
  return event.replace(/([a-z])([A-Z])/g, '$1_$2').toUpperCase();
}

function fail(code: number, message: string, data?: unknown): SessionResult {
  return { ok: false, code, message, ...(data !== undefined ? { data } : {}) };
}

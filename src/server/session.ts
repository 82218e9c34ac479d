import { randomBytes } from 'node:crypto';
import type { ProtocolStateMachine } from '../mcp/protocolState.js';

export type SessionEntry = {
  readonly machine: ProtocolStateMachine;
  readonly createdAtMs: number;
  lastSeenMs: number;
};

export type SessionRequireResult =
  | { ok: true; sessionId: string; session: SessionEntry }
  | { ok: false; status: 400 | 404 };

export type SessionStore = Readonly<{
  /** Mint a new session id bound to a fresh state machine. Returns the new id. */
  create: () => string;
  /** Get a session; undefined if unknown or evicted. */
  get: (sessionId: string) => SessionEntry | undefined;
  /**
   * Streamable HTTP rules:
   * - missing session id => 400
   * - unknown, expired or evicted => 404
   * A successful lookup refreshes the idle clock.
   */
  require: (sessionId: string | undefined) => SessionRequireResult;
  /** Shut down and forget a session. Returns false when the id was unknown. */
  delete: (sessionId: string) => boolean;
  /** Drop sessions idle beyond the configured timeout. Returns the number evicted. */
  sweepIdle: () => number;
  /** Shut down and forget every session. */
  clear: () => void;
  size: () => number;
}>;

export type CreateSessionStoreOptions = Readonly<{
  createMachine: () => ProtocolStateMachine;
  /** Hard cap on tracked sessions; beyond it the oldest (insertion order) is evicted. */
  maxSessions?: number;
  /** Idle time after which a session is evicted; 0 disables idle eviction. */
  idleTimeoutMs?: number;
  /** Injectable clock for tests; default is Date.now. */
  nowMs?: () => number;
}>;

function mint(): string {
  // base64url is header-safe ASCII.
  return randomBytes(16).toString('base64url');
}

export function createSessionStore(opts: CreateSessionStoreOptions): SessionStore {
  const maxSessions = clampInt(opts.maxSessions ?? 64, 1, 1024);
  const idleTimeoutMs = Math.max(0, Math.trunc(opts.idleTimeoutMs ?? 0));
  const nowMs = opts.nowMs ?? (() => Date.now());

  // Map iteration order is insertion order; used for deterministic eviction.
  const sessions = new Map<string, SessionEntry>();

  const drop = (id: string, entry: SessionEntry) => {
    entry.machine.transition('shutdown');
    sessions.delete(id);
  };

  const isIdle = (entry: SessionEntry, now: number) =>
    idleTimeoutMs > 0 && now - entry.lastSeenMs >= idleTimeoutMs;

  const evictIfNeeded = () => {
    while (sessions.size > maxSessions) {
      const oldest = sessions.entries().next().value;
      if (oldest === undefined) break;
      drop(oldest[0], oldest[1]);
    }
  };

  const sweepIdle = () => {
    const now = nowMs();
    let evicted = 0;
    for (const [id, entry] of sessions) {
      if (!isIdle(entry, now)) continue;
      drop(id, entry);
      evicted += 1;
    }
    return evicted;
  };

  return {
    create: () => {
      sweepIdle();
      const id = mint();
      const now = nowMs();
      sessions.set(id, { machine: opts.createMachine(), createdAtMs: now, lastSeenMs: now });
      evictIfNeeded();
      return id;
    },
    get: (sessionId) => sessions.get(sessionId),
    require: (sessionId) => {
      if (!sessionId) return { ok: false, status: 400 };
      const session = sessions.get(sessionId);
      if (!session) return { ok: false, status: 404 };
      const now = nowMs();
      if (isIdle(session, now)) {
        drop(sessionId, session);
        return { ok: false, status: 404 };
      }
      session.lastSeenMs = now;
      return { ok: true, sessionId, session };
    },
    delete: (sessionId) => {
      const session = sessions.get(sessionId);
      if (!session) return false;
      drop(sessionId, session);
      return true;
    },
    sweepIdle,
    clear: () => {
      for (const [id, entry] of [...sessions]) drop(id, entry);
    },
    size: () => sessions.size,
  };
}

function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min;
  const x = Math.trunc(n);
  if (x < min) return min;
  if (x > max) return max;
  return x;
}

import * as http from 'node:http';
import type { Logger } from '../logging/redact.js';
import { createRouter, type McpDeleteHandler, type McpPostHandler } from './router.js';
import type { SessionStore } from './session.js';

export type HttpServerSettings = Readonly<{
  bindAddress: string;
  port: number;
  endpointPath: string;
  maxMessageBytes: number;
  requestTimeoutMs: number;
  idleTimeoutMs: number;
}>;

export class HttpServer {
  private server: http.Server | undefined;
  private sweepTimer: NodeJS.Timeout | undefined;

  public constructor(
    private readonly deps: {
      settings: HttpServerSettings;
      logger: Logger;
      onMcpPost: McpPostHandler;
      onMcpDelete?: McpDeleteHandler;
      /** Swept for idle sessions while running and cleared on stop. */
      sessions?: SessionStore;
    },
  ) {}

  /** Bound port; differs from the configured one when that was 0. */
  public get port(): number | undefined {
    const addr = this.server?.address();
    return addr && typeof addr === 'object' ? addr.port : undefined;
  }

  public async start(): Promise<void> {
    if (this.server) return;

    const { settings, logger } = this.deps;

    const requestListener = createRouter({
      endpointPath: settings.endpointPath,
      maxRequestBytes: settings.maxMessageBytes,
      logger,
      onMcpPost: this.deps.onMcpPost,
      ...(this.deps.onMcpDelete ? { onMcpDelete: this.deps.onMcpDelete } : {}),
    });

    const srv = http.createServer(requestListener);
    srv.requestTimeout = Math.max(250, Math.min(settings.requestTimeoutMs, 120_000));
    this.server = srv;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        srv.off('listening', onListening);
        reject(err);
      };
      const onListening = () => {
        srv.off('error', onError);
        resolve();
      };
      srv.once('error', onError);
      srv.once('listening', onListening);
      srv.listen(settings.port, settings.bindAddress);
    }).catch((err: unknown) => {
      this.server = undefined;
      throw err;
    });

    const sessions = this.deps.sessions;
    if (sessions && settings.idleTimeoutMs > 0) {
      const every = Math.max(1_000, Math.min(settings.idleTimeoutMs, 60_000));
      this.sweepTimer = setInterval(() => {
        const evicted = sessions.sweepIdle();
        if (evicted > 0) logger.debug('Evicted idle sessions.', { evicted, remaining: sessions.size() });
      }, every);
      this.sweepTimer.unref();
    }

    logger.debug(`HTTP server started on http://${settings.bindAddress}:${this.port ?? settings.port}${settings.endpointPath}`);
  }

  public async stop(): Promise<void> {
    const srv = this.server;
    if (!srv) return;

    this.server = undefined;
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
    this.deps.sessions?.clear();

    await new Promise<void>((resolve, reject) => {
      // close() stops accepting new connections; idle keep-alives are dropped too.
      srv.close((err) => (err ? reject(err) : resolve()));
      srv.closeIdleConnections();
    });

    this.deps.logger.debug('HTTP server stopped.');
  }
}

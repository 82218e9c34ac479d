// src/cliProgram.ts
//
// Command definitions. Flags override environment variables; see config.ts for names and ranges.

import { Command } from 'commander';
import { readSettings, type EngineSettings, type SettingsOverrides } from './config.js';
import { createLogger, createStreamSink, type Logger } from './logging/redact.js';
import { startEngine, type RunningEngine } from './runtime.js';

export type CliIo = Readonly<{
  env: NodeJS.ProcessEnv;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Called once the transport is serving; used to wire signal handling. */
  onStarted?: (engine: RunningEngine) => void;
}>;

type ServeFlags = {
  transport?: string;
  port?: string;
  bind?: string;
  endpoint?: string;
  lenient?: boolean;
  maxMessageBytes?: string;
  maxResponseBytes?: string;
  maxSessions?: string;
  idleTimeoutMs?: string;
  requestTimeoutMs?: string;
  debug?: boolean;
};

export function createProgram(io: CliIo, version: string): Command {
  const program = new Command();

  program
    .name('mcp-session-engine')
    .description('MCP protocol engine over stdio or HTTP')
    .version(version)
    .configureOutput({
      writeOut: (s) => io.stdout.write(s),
      writeErr: (s) => io.stderr.write(s),
    });

  withSettingFlags(program.command('serve').description('Serve MCP over the selected transport')).action(
    async (flags: ServeFlags) => {
      const settings = resolveSettings(io, flags);
      if (!settings) return;

      const logger = createLogger(createStreamSink(io.stderr), {
        debugEnabled: settings.debugLogging,
        timestamps: true,
      });
      const engine = await startEngine(settings, {
        logger,
        ...(settings.debugLogging ? { traceLogger: logger } : {}),
        input: io.stdin,
        output: io.stdout,
      });
      announce(logger, settings, engine);
      io.onStarted?.(engine);
      await engine.done;
    },
  );

  withSettingFlags(program.command('config').description('Print the resolved settings as JSON')).action(
    (flags: ServeFlags) => {
      const settings = resolveSettings(io, flags);
      if (settings) io.stdout.write(`${JSON.stringify(settings, null, 2)}\n`);
    },
  );

  return program;
}

function withSettingFlags(cmd: Command): Command {
  return cmd
    .option('-t, --transport <kind>', 'stdio or http (MCP_TRANSPORT)')
    .option('-p, --port <port>', 'HTTP port (MCP_PORT)')
    .option('--bind <address>', 'HTTP bind address, loopback only (MCP_BIND_ADDRESS)')
    .option('--endpoint <path>', 'HTTP endpoint path (MCP_ENDPOINT_PATH)')
    .option('--lenient', 'accept non-"2.0" envelopes and tolerate sequencing errors (MCP_STRICT=false)')
    .option('--max-message-bytes <n>', 'inbound payload cap (MCP_MAX_MESSAGE_BYTES)')
    .option('--max-response-bytes <n>', 'outbound response cap (MCP_MAX_RESPONSE_BYTES)')
    .option('--max-sessions <n>', 'HTTP session cap (MCP_MAX_SESSIONS)')
    .option('--idle-timeout-ms <ms>', 'HTTP session idle timeout, 0 disables (MCP_IDLE_TIMEOUT_MS)')
    .option('--request-timeout-ms <ms>', 'request timeout (MCP_REQUEST_TIMEOUT_MS)')
    .option('--debug', 'debug logging and message traces on stderr (MCP_DEBUG)');
}

export function flagsToOverrides(flags: ServeFlags): SettingsOverrides {
  const out: SettingsOverrides = {};
  if (flags.transport !== undefined) out.transport = flags.transport;
  if (flags.port !== undefined) out.port = flags.port;
  if (flags.bind !== undefined) out.bindAddress = flags.bind;
  if (flags.endpoint !== undefined) out.endpointPath = flags.endpoint;
  if (flags.lenient) out.strictMode = false;
  if (flags.maxMessageBytes !== undefined) out.maxMessageBytes = flags.maxMessageBytes;
  if (flags.maxResponseBytes !== undefined) out.maxResponseBytes = flags.maxResponseBytes;
  if (flags.maxSessions !== undefined) out.maxSessions = flags.maxSessions;
  if (flags.idleTimeoutMs !== undefined) out.idleTimeoutMs = flags.idleTimeoutMs;
  if (flags.requestTimeoutMs !== undefined) out.requestTimeoutMs = flags.requestTimeoutMs;
  if (flags.debug) out.debugLogging = true;
  return out;
}

function resolveSettings(io: CliIo, flags: ServeFlags): EngineSettings | undefined {
  const { settings, problems } = readSettings(io.env, flagsToOverrides(flags));
  if (!settings) {
    io.stderr.write(`[error] Invalid configuration; server will not start. ${problems.join(' ')}\n`);
    process.exitCode = 1;
    return undefined;
  }
  return settings;
}

function announce(logger: Logger, settings: EngineSettings, engine: RunningEngine): void {
  if (settings.transport === 'http') {
    const port = engine.port ?? settings.port;
    logger.info(`MCP server listening on http://${settings.bindAddress}:${port}${settings.endpointPath} (localhost-only).`);
  } else {
    logger.info('MCP server reading newline-delimited JSON on stdin.');
  }
}

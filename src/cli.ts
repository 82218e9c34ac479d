#!/usr/bin/env node
import { createProgram } from './cliProgram.js';
import { readServerInfo } from './runtime.js';

const program = createProgram(
  {
    env: process.env,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    onStarted: (engine) => {
      const shutdown = () => {
        engine.stop().catch((err: unknown) => {
          process.stderr.write(`[error] Failed to stop server: ${String(err).slice(0, 500)}\n`);
          process.exitCode = 1;
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    },
  },
  readServerInfo().version,
);

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`[error] ${err instanceof Error ? err.message : String(err)}\n`.slice(0, 600));
  process.exitCode = 1;
});

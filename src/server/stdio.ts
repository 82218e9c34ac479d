// src/server/stdio.ts
//
// Newline-delimited JSON over a pair of streams (stdin/stdout by default). One line is one payload,
// single message or batch. Lines are handled strictly in order against a single session.
// Only protocol traffic is written to the output stream; logs go to the logger's sink. An output
// stream error (EPIPE when the peer goes away) stops the transport.

import * as readline from 'node:readline';
import type { Logger } from '../logging/redact.js';
import { JSONRPC_INTERNAL_ERROR } from '../mcp/errors.js';
import type { MessageHandler } from '../mcp/handler.js';
import { serializeError } from '../mcp/jsonrpc.js';
import type { ProtocolStateMachine } from '../mcp/protocolState.js';

export type StdioTransportDeps = Readonly<{
  handler: MessageHandler;
  machine: ProtocolStateMachine;
  logger: Logger;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}>;

export class StdioTransport {
  private rl: readline.Interface | undefined;

  public constructor(private readonly deps: StdioTransportDeps) {}

  /** Serve until the input ends or stop() is called, then shut the session down. */
  public async run(): Promise<void> {
    const input = this.deps.input ?? process.stdin;
    const output = this.output();
    const rl = readline.createInterface({ input, terminal: false, crlfDelay: Infinity });
    this.rl = rl;

    const onOutputError = (err: Error) => {
      this.deps.logger.error('stdio output failed; stopping.', { error: err.message });
      this.stop();
    };
    output.on('error', onOutputError);

    try {
      for await (const line of rl) {
        if (!line.trim()) continue;
        this.send(await this.handleLine(line));
      }
    } finally {
      output.off('error', onOutputError);
      this.rl = undefined;
      this.deps.machine.transition('shutdown');
      this.deps.logger.debug('stdio transport closed.');
    }
  }

  public stop(): void {
    this.rl?.close();
  }

  private async handleLine(line: string): Promise<string | undefined> {
    try {
      return await this.deps.handler.handleText(line, this.deps.machine);
    } catch (err) {
      this.deps.logger.error('Handler threw; answering with internal error.', {
        error: err instanceof Error ? err.message : String(err),
      });
      return serializeError(null, JSONRPC_INTERNAL_ERROR, 'Internal error');
    }
  }

  private send(text: string | undefined): void {
    if (text === undefined) return;
    const output = this.output();
    if (!output.writable) return;
    output.write(`${text}\n`);
  }

  private output(): NodeJS.WritableStream {
    return this.deps.output ?? process.stdout;
  }
}

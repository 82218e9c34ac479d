import { PassThrough, Writable } from 'node:stream';
import { expect } from 'chai';
import { createProgram, flagsToOverrides, type CliIo } from '../../src/cliProgram.js';
import { DEFAULT_SETTINGS } from '../../src/config.js';

class Capture extends Writable {
  public text = '';

  public override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString('utf8');
    callback();
  }
}

function createIo(env: NodeJS.ProcessEnv = {}): CliIo & { stdin: PassThrough; stdout: Capture; stderr: Capture } {
  return { env, stdin: new PassThrough(), stdout: new Capture(), stderr: new Capture() };
}

describe('cli program', () => {
  let savedExitCode: typeof process.exitCode;

  beforeEach(() => {
    savedExitCode = process.exitCode;
  });

  afterEach(() => {
    process.exitCode = savedExitCode;
  });

  it('maps flags onto setting overrides', () => {
    expect(flagsToOverrides({ transport: 'http', port: '8080', lenient: true, debug: false })).to.deep.equal({
      transport: 'http',
      port: '8080',
      strictMode: false,
    });
  });

  it('prints the resolved settings with flags over environment', async () => {
    const io = createIo({ MCP_PORT: '8080', MCP_MAX_SESSIONS: '4' });
    await createProgram(io, '1.2.3').parseAsync(['node', 'cli', 'config', '--port', '9000', '--lenient']);

    expect(JSON.parse(io.stdout.text)).to.deep.equal({
      ...DEFAULT_SETTINGS,
      port: 9000,
      maxSessions: 4,
      strictMode: false,
    });
    expect(io.stderr.text).to.equal('');
  });

  it('refuses to start on invalid configuration', async () => {
    const io = createIo({ MCP_PORT: 'eighty' });
    await createProgram(io, '1.2.3').parseAsync(['node', 'cli', 'serve']);

    expect(io.stderr.text).to.equal(
      '[error] Invalid configuration; server will not start. port must be an integer in [1, 65535] (got "eighty").\n',
    );
    expect(io.stdout.text).to.equal('');
    expect(process.exitCode).to.equal(1);
  });

  it('serves stdio until input ends', async () => {
    const io = createIo();
    const run = createProgram(io, '1.2.3').parseAsync(['node', 'cli', 'serve']);
    io.stdin.end('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
    await run;

    expect(io.stdout.text).to.equal('{"jsonrpc":"2.0","id":1,"result":{}}\n');
    expect(io.stderr.text).to.include('[info] MCP server reading newline-delimited JSON on stdin.');
  });
});

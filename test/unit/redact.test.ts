import { Writable } from 'node:stream';
import { expect } from 'chai';
import { createLogger, createStreamSink, redactHeaders, redactString } from '../../src/logging/redact.js';
import { CollectingSink } from './support.js';

describe('redaction', () => {
  it('redacts authorization and session ids in structured meta', () => {
    const output = new CollectingSink();
    const logger = createLogger(output, { debugEnabled: true, maxChars: 2048 });

    logger.debug('test', {
      authorization: 'Bearer secret-token',
      'mcp-session-id': 'session-123',
      nested: { Authorization: 'Bearer another-secret' },
    });

    expect(output.lines).to.deep.equal([
      '[debug] test {"authorization":"[REDACTED]","mcp-session-id":"[REDACTED]","nested":{"Authorization":"[REDACTED]"}}',
    ]);
  });

  it('redacts session id and authorization headers in header maps', () => {
    const redacted = redactHeaders({
      'MCP-Session-Id': 'session-123',
      authorization: 'Bearer secret-token',
      'content-type': 'application/json',
    });

    expect(redacted['MCP-Session-Id']).to.equal('[REDACTED]');
    expect(redacted['authorization']).to.equal('[REDACTED]');
    expect(redacted['content-type']).to.equal('application/json');
  });

  it('redacts bearer tokens and session headers inside free text', () => {
    expect(redactString('sent Bearer abc.def with MCP-Session-Id: s-1, ok')).to.equal(
      'sent Bearer [REDACTED] with MCP-Session-Id: [REDACTED], ok',
    );
  });

  it('bounds debug log output deterministically', () => {
    const output = new CollectingSink();
    const logger = createLogger(output, { debugEnabled: true, maxChars: 80 });

    logger.debug('test', { payload: 'x'.repeat(200) });

    const line = output.lines[0] ?? '';
    expect(line.length).to.equal(80);
    expect(line.startsWith('[debug] test {"payload":"xxx')).to.equal(true);
    expect(line.endsWith('...[truncated]')).to.equal(true);
  });

  it('drops meta when the message already fills the line', () => {
    const output = new CollectingSink();
    const logger = createLogger(output, { debugEnabled: true, maxChars: 40 });

    logger.warn('y'.repeat(100), { k: 1 });

    expect(output.lines).to.deep.equal([`[warn] ${'y'.repeat(19)}...[truncated]`]);
  });

  it('suppresses debug lines unless enabled', () => {
    const output = new CollectingSink();
    const logger = createLogger(output, { debugEnabled: false });

    logger.debug('hidden');
    logger.info('shown');

    expect(output.lines).to.deep.equal(['[info] shown']);
  });

  it('writes one line per entry to a stream sink', () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString('utf8'));
        callback();
      },
    });
    const logger = createLogger(createStreamSink(stream), { debugEnabled: false });

    logger.error('boom', { code: 7 });

    expect(chunks.join('')).to.equal('[error] boom {"code":7}\n');
  });
});

import { expect } from 'chai';
import { dispatchToolCall } from '../../src/tools/dispatcher.js';
import { SchemaRegistry } from '../../src/tools/schemaRegistry.js';

describe('dispatcher', () => {
  const deps = () => ({ schemaRegistry: SchemaRegistry.getOrCreate() });

  it('returns INVALID_PARAMS for unknown tool names', async () => {
    const res = await dispatchToolCall('unknown.tool', {}, deps());
    expect(res.ok).to.equal(false);
    if (!res.ok) {
      expect(res.error.code).to.equal(-32602);
      expect(res.error.data).to.deep.equal({ code: 'MCP_SESSION_ENGINE/INVALID_PARAMS', tool: 'unknown.tool' });
    }
  });

  it('returns INVALID_PARAMS with schema issues before the handler runs', async () => {
    const res = await dispatchToolCall('add', { a: 1, b: 'two' }, deps());
    expect(res.ok).to.equal(false);
    if (res.ok) return;
    expect(res.error.code).to.equal(-32602);
    const data = res.error.data as { code?: string; tool?: string; issues?: Array<{ path: string; keyword: string }> };
    expect(data.code).to.equal('MCP_SESSION_ENGINE/INVALID_PARAMS');
    expect(data.tool).to.equal('add');
    expect(data.issues?.map((i) => [i.path, i.keyword])).to.deep.equal([['/b', 'type']]);
  });

  it('rejects arguments the schema does not name', async () => {
    const res = await dispatchToolCall('echo', { text: 'hi', loud: true }, deps());
    expect(res.ok).to.equal(false);
    if (!res.ok) expect(res.error.code).to.equal(-32602);
  });

  it('wraps tool output in a ToolCallResult with stable text content', async () => {
    const res = await dispatchToolCall('add', { b: 2, a: 40 }, deps());
    expect(res.ok).to.equal(true);
    if (!res.ok) return;
    expect(res.result).to.deep.equal({
      isError: false,
      structuredContent: { sum: 42 },
      content: [{ type: 'text', text: '{"sum":42}' }],
    });
  });

  it('repeats echo text', async () => {
    const res = await dispatchToolCall('echo', { text: 'ab', repeat: 3 }, deps());
    expect(res.ok && res.result.structuredContent).to.deep.equal({ text: 'ababab' });
  });

  it('reports a non-finite sum as invalid params', async () => {
    const res = await dispatchToolCall('add', { a: Number.MAX_VALUE, b: Number.MAX_VALUE }, deps());
    expect(res.ok).to.equal(false);
    if (!res.ok) expect(res.error.data).to.deep.equal({ detail: 'sum is not finite' });
  });
});

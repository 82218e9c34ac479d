import { expect } from 'chai';
import {
  capabilitiesEqual,
  capabilitiesFromJson,
  capabilitiesToJson,
  clientCapabilitiesFromWire,
  createCapabilities,
  defaultServerCapabilities,
  mergeCapabilities,
  serverCapabilitiesToWire,
} from '../../src/mcp/capabilities.js';

describe('capabilities', () => {
  it('starts with every flag cleared', () => {
    expect(createCapabilities()).to.deep.equal({
      server: { tools: false, resources: false, prompts: false, logging: false },
      client: { roots: false, sampling: false },
    });
  });

  it('merges by logical OR without touching either input', () => {
    const base = createCapabilities();
    const withTools = { ...base, server: { ...base.server, tools: true } };
    const withRoots = { ...base, client: { ...base.client, roots: true } };

    const merged = mergeCapabilities(withTools, withRoots);
    expect(merged).to.deep.equal({
      server: { tools: true, resources: false, prompts: false, logging: false },
      client: { roots: true, sampling: false },
    });
    expect(withTools.client.roots).to.equal(false);
    expect(withRoots.server.tools).to.equal(false);
  });

  it('never clears a flag during a merge', () => {
    const server = defaultServerCapabilities();
    const merged = mergeCapabilities(server, createCapabilities());
    expect(capabilitiesEqual(merged, server)).to.equal(true);
    expect(capabilitiesEqual(mergeCapabilities(merged, merged), merged)).to.equal(true);
  });

  it('reads client capabilities from their wire objects', () => {
    expect(clientCapabilitiesFromWire({ roots: { listChanged: true } }).client).to.deep.equal({
      roots: true,
      sampling: false,
    });
    expect(clientCapabilitiesFromWire({ sampling: {} }).client).to.deep.equal({ roots: false, sampling: true });
    expect(clientCapabilitiesFromWire({ roots: {} }).client.roots).to.equal(false);
    expect(clientCapabilitiesFromWire({ roots: { listChanged: false } }).client.roots).to.equal(false);
    expect(clientCapabilitiesFromWire(undefined)).to.deep.equal(createCapabilities());
  });

  it('writes only the enabled server capabilities', () => {
    expect(serverCapabilitiesToWire(defaultServerCapabilities())).to.deep.equal({ logging: {} });
    const base = createCapabilities();
    expect(serverCapabilitiesToWire({ ...base, server: { ...base.server, tools: true } })).to.deep.equal({
      tools: { listChanged: true },
    });
  });

  it('round-trips through the flat JSON view', () => {
    const caps = mergeCapabilities(defaultServerCapabilities(), clientCapabilitiesFromWire({ roots: { listChanged: true } }));
    const back = capabilitiesFromJson(capabilitiesToJson(caps));
    expect(back).to.not.equal(undefined);
    if (back) expect(capabilitiesEqual(back, caps)).to.equal(true);
    expect(capabilitiesFromJson('nope')).to.equal(undefined);
  });
});

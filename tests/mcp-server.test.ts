import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer } from '../src/mcp/create-server.js';
import { ResponseCache } from '../src/core/cache.js';
import { WARN_NO_FRED_KEY } from '../src/core/auction-engine.js';
import { NOTE_10Y, BILL_4W, fakeAuctions, fakeYields } from './fixtures.js';

const TextContent = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
});

const ResourceText = z.object({
  contents: z.array(z.object({ uri: z.string(), text: z.string() })),
});

const PromptText = z.object({
  messages: z.array(z.object({ content: z.object({ type: z.literal('text'), text: z.string() }) })),
});

async function connect() {
  const sources = {
    cache: new ResponseCache(),
    auctions: fakeAuctions([NOTE_10Y, BILL_4W]),
    yields: fakeYields(false),
  };
  const server = createMcpServer(sources);
  const client = new Client({ name: 'test-client', version: '0.0.0' });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  return { client, server, sources };
}

describe('MCP server', () => {
  let close: (() => Promise<void>) | undefined;

  afterEach(async () => {
    await close?.();
    close = undefined;
  });

  it('lists both tools', async () => {
    const { client } = await connect();
    close = () => client.close();

    const { tools } = await client.listTools();
    expect(tools.map(t => t.name).sort()).toEqual(['auction_analysis', 'treasury_auctions']);
  });

  it('treasury_auctions returns the list result as JSON', async () => {
    const { client, sources } = await connect();
    close = () => client.close();

    const raw = await client.callTool({ name: 'treasury_auctions', arguments: { security_type: 'Note', days_back: 14 } });
    const [first] = TextContent.parse(raw).content;
    const body = JSON.parse(first.text);

    expect(sources.auctions.fetchAuctions).toHaveBeenCalledWith({
      daysBack: 14,
      securityType: 'Note',
      securityTerm: undefined,
    });
    expect(body.count).toBe(2);
    expect(body.period).toBe('last 14 days');
    expect(body._warnings).toEqual([WARN_NO_FRED_KEY]);
  });

  it('auction_analysis applies its defaults', async () => {
    const { client, sources } = await connect();
    close = () => client.close();

    const raw = await client.callTool({ name: 'auction_analysis', arguments: {} });
    const body = JSON.parse(TextContent.parse(raw).content[0].text);

    expect(sources.auctions.fetchAuctions).toHaveBeenCalledWith({ daysBack: 90, securityTerm: undefined });
    expect(body.demand_signal).toBe('healthy');
    expect(body.total_auctions).toBe(2);
  });

  it('serves the methodology resource', async () => {
    const { client } = await connect();
    close = () => client.close();

    const raw = await client.readResource({ uri: 'auction-demand://methodology' });
    const body = JSON.parse(ResourceText.parse(raw).contents[0].text);
    expect(body.gradeable_types).toEqual(['Note', 'Bond', 'TIPS', 'FRN']);
    expect(body.wi_proxy.max_divergence_pct).toBe(1.5);
  });

  it('serves cache statistics', async () => {
    const { client, sources } = await connect();
    close = () => client.close();
    sources.cache.set('k', 'v', 60);

    const raw = await client.readResource({ uri: 'auction-demand://cache/stats' });
    expect(JSON.parse(ResourceText.parse(raw).contents[0].text)).toEqual({ entries: 1, hits: 0, misses: 0 });
  });

  it('builds the demand assessment prompt for one maturity', async () => {
    const { client } = await connect();
    close = () => client.close();

    const raw = await client.getPrompt({ name: 'assess_treasury_demand', arguments: { term: '10-Year' } });
    const text = PromptText.parse(raw).messages[0].content.text;
    expect(text).toContain('Assess US Treasury auction demand for the 10-Year maturity.');
    expect(text).toContain('1. Call auction_analysis with security_term "10-Year" and days_back 180.');
  });
});

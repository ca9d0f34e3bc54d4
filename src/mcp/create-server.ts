import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { executeAuctionListCore, executeAuctionAnalysisCore } from '../core/auction-engine.js';
import { APP_NAME, APP_VERSION } from '../core/config.js';
import { getMethodology } from '../processing/methodology.js';
import type { LiveSources } from '../core/sources.js';

/**
 * Builds the MCP server over a set of sources.
 *
 * Tools:
 *   - treasury_auctions: recent auction results with demand metrics and grades
 *   - auction_analysis: demand health, per-maturity trends, demand signal
 *
 * Resources:
 *   - auction-demand://methodology: grading thresholds, weights and bands
 *   - auction-demand://cache/stats: response cache statistics
 *
 * Prompts:
 *   - assess_treasury_demand: guided demand assessment
 */
export function createMcpServer(sources: LiveSources): McpServer {
  const server = new McpServer(
    { name: APP_NAME, version: APP_VERSION },
    { capabilities: { tools: {}, resources: {}, prompts: {} } }
  );

  // ── Tools ──────────────────────────────────────────────────────────────

  server.tool(
    'treasury_auctions',
    'Get recent US Treasury auction results with demand metrics: yield, bid-to-cover, bidder mix (dealer/indirect/direct %), tail and SOMA participation. Notes, bonds, TIPS and FRNs include a demand grade (A-F); bills show the discount rate and are not graded.',
    {
      security_type: z.string().optional().describe('Filter by type: "Note", "Bond", "Bill", "TIPS", "FRN"'),
      security_term: z.string().optional().describe('Filter by term, e.g. "10-Year", "2-Year", "4-Week"'),
      days_back: z.number().optional().default(30).describe('Lookback period in days (1-365, default 30)'),
      limit: z.number().optional().default(20).describe('Max results to return (1-100, default 20)'),
    },
    async ({ security_type, security_term, days_back, limit }) => {
      const result = await executeAuctionListCore(sources, {
        securityType: security_type,
        securityTerm: security_term,
        daysBack: days_back,
        limit,
      });
      return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
    }
  );

  server.tool(
    'auction_analysis',
    'Analyze Treasury auction demand health: grades each note/bond auction, detects trend direction per maturity (improving/deteriorating/stable) and summarizes an overall demand signal. Without a term filter, shows cross-maturity demand health.',
    {
      security_term: z.string().optional().describe('Focus on one maturity, e.g. "10-Year", "2-Year", "30-Year"'),
      days_back: z.number().optional().default(90).describe('Lookback period in days (1-365, default 90)'),
    },
    async ({ security_term, days_back }) => {
      const result = await executeAuctionAnalysisCore(sources, {
        securityTerm: security_term,
        daysBack: days_back,
      });
      return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
    }
  );

  // ── Resources ──────────────────────────────────────────────────────────

  server.resource(
    'methodology',
    'auction-demand://methodology',
    { description: 'Grading thresholds, metric weights, GPA map and demand signal bands', mimeType: 'application/json' },
    async (uri) => ({
      contents: [{
        uri: uri.href,
        mimeType: 'application/json',
        text: JSON.stringify(getMethodology(), null, 2),
      }],
    })
  );

  server.resource(
    'cache-stats',
    'auction-demand://cache/stats',
    { description: 'Response cache entries, hits and misses', mimeType: 'application/json' },
    async (uri) => ({
      contents: [{
        uri: uri.href,
        mimeType: 'application/json',
        text: JSON.stringify(sources.cache.stats(), null, 2),
      }],
    })
  );

  // ── Prompts ────────────────────────────────────────────────────────────

  server.prompt(
    'assess_treasury_demand',
    'Assess recent Treasury auction demand, optionally for one maturity',
    {
      term: z.string().optional().describe('Maturity to focus on, e.g. "10-Year"'),
    },
    async ({ term }) => {
      const scope = term
        ? `the ${term} maturity`
        : 'all maturities';
      const analysisCall = term
        ? `auction_analysis with security_term "${term}" and days_back 180`
        : 'auction_analysis with days_back 90';

      return {
        messages: [{
          role: 'user' as const,
          content: {
            type: 'text' as const,
            text: `Assess US Treasury auction demand for ${scope}.

1. Call ${analysisCall}.
2. Call treasury_auctions${term ? ` with security_term "${term}"` : ''} for the latest individual results.

Then report:
- The overall demand signal and average GPA
- Per-maturity grades and trend direction (tail, bid-to-cover, dealer and indirect share)
- Auctions that tailed or stopped through notably
- Any warnings, including whether the tail used FRED CMT yields or avg_med_yield

Close with a one-paragraph view on whether end-investor demand is strengthening or weakening.`,
          },
        }],
      };
    }
  );

  return server;
}

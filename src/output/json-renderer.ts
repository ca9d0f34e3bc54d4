import type { AuctionAnalysisResult, AuctionListResult } from '../core/types.js';

/**
 * Renders query results as structured JSON for programmatic use.
 * The same shape is returned by the MCP tools and the web API.
 */

export function renderJson(result: AuctionListResult | AuctionAnalysisResult): string {
  return JSON.stringify(result, null, 2);
}

#!/usr/bin/env node

/**
 * MCP (Model Context Protocol) server entry point for auction-demand.
 *
 * Exposes Treasury auction grading and demand analysis as MCP tools over
 * stdio. Diagnostics go to stderr; stdout carries protocol frames only.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './core/config.js';
import { createSources } from './core/sources.js';
import { describeError } from './core/errors.js';
import { createMcpServer } from './mcp/create-server.js';
import type { AppConfig } from './core/config.js';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(`[auction-demand] ${describeError(err)}`);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

if (!config.fredApiKey) {
  console.error('[auction-demand] FRED_API_KEY not set; tails fall back to avg_med_yield');
}

const server = createMcpServer(createSources(config));

// ── Start Server ───────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);

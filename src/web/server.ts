#!/usr/bin/env node

/**
 * JSON API server for auction-demand.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 *   auction-demand-web           # If globally linked
 */

import { loadConfig } from '../core/config.js';
import { createSources } from '../core/sources.js';
import { describeError } from '../core/errors.js';
import { buildApp } from './app.js';
import type { AppConfig } from '../core/config.js';

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(describeError(err));
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const server = buildApp(createSources(config));

await server.listen({ port: config.port, host: '0.0.0.0' });

console.log(`
  auction-demand API
  http://localhost:${config.port}/api/auctions

  Press Ctrl+C to stop
`);

#!/usr/bin/env node

/**
 * HTTP API server for filing-ratios.
 *
 * Usage:
 *   npm run web                          # Start on default port 3005
 *   PORT=8080 EDGAR_DATA_DIR=./2019q2 npm run web
 */

import { buildServer } from './app.js';
import { DATA_DIR, WEB_PORT } from '../core/config.js';

const server = buildServer();

await server.listen({ port: WEB_PORT, host: '0.0.0.0' });

console.log(`
  filing-ratios API
  http://localhost:${WEB_PORT}

  Dataset: ${DATA_DIR}
  API: http://localhost:${WEB_PORT}/api/ratios?year=2019&quarter=Q2
  Press Ctrl+C to stop
`);

#!/usr/bin/env node

/**
 * REST API server for kpi-variance-nl.
 *
 * Usage:
 *   npm run web                  # Start on default port 3005
 *   PORT=8080 npm run web        # Custom port
 *   KPI_PREDICTOR=none npm run web
 */

import { loadConfig } from '../core/config.js';
import { buildServer } from './app.js';

const config = loadConfig();
const server = buildServer({ config });

await server.listen({ port: config.port, host: '0.0.0.0' });

console.log(`
  kpi-variance-nl API
  http://localhost:${config.port}

  API: http://localhost:${config.port}/api/metrics
  Press Ctrl+C to stop
`);

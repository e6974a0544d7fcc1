import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import { AnalysisCache } from '../core/analysis-cache.js';
import type { AppConfig } from '../core/config.js';
import type { AnalysisResult } from '../core/types.js';
import { createPredictor } from '../processing/predictors.js';
import { registerAnalyzeRoutes } from './routes/analyze.js';
import { registerAskRoutes } from './routes/ask.js';
import { registerMetaRoutes } from './routes/meta.js';

export interface BuildServerOptions {
  config: AppConfig;
  cache?: AnalysisCache<AnalysisResult>;
}

/**
 * Build the REST API without listening, so tests can drive it with inject().
 */
export function buildServer({ config, cache }: BuildServerOptions): FastifyInstance {
  const server = Fastify({ logger: false, bodyLimit: 20 * 1024 * 1024 });

  const ctx = {
    predictor: createPredictor(config.predictor),
    cache: cache ?? new AnalysisCache<AnalysisResult>(),
    topN: config.topN,
  };

  registerAnalyzeRoutes(server, ctx);
  registerAskRoutes(server, ctx);
  registerMetaRoutes(server, ctx);

  // Global error handler
  server.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: { type: 'validation', message: error.message } });
    }
    console.error('Server error:', error.message);
    return reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}

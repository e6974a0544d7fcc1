import type { FastifyInstance } from 'fastify';
import { METRIC_DEFINITIONS } from '../../processing/metric-definitions.js';
import { INTENT_RULES } from '../../analysis/query-parser.js';
import type { RouteContext } from './context.js';

export function registerMetaRoutes(server: FastifyInstance, ctx: RouteContext) {
  server.get('/api/metrics', async () => {
    return {
      metrics: METRIC_DEFINITIONS.map(m => ({
        id: m.id,
        display_name: m.display_name,
        description: m.description,
        unit_type: m.unit_type,
        aggregation: m.aggregation,
      })),
    };
  });

  server.get('/api/intents', async () => {
    return { intents: [...INTENT_RULES.map(r => r.intent), 'help'] };
  });

  server.get('/api/cache-stats', async () => {
    return { ...ctx.cache.stats(), predictor: ctx.predictor.name };
  });
}

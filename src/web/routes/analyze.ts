import type { FastifyInstance } from 'fastify';
import { runAnalysis, runMovers } from '../../core/analysis-engine.js';
import { serializeAnalysis } from '../../output/json-renderer.js';
import {
  AnalyzeBodySchema,
  MoversBodySchema,
  errorToHttpStatus,
  formatZodIssues,
  tableFromInput,
} from '../serialization.js';
import type { RouteContext } from './context.js';

export function registerAnalyzeRoutes(server: FastifyInstance, ctx: RouteContext) {
  server.post('/api/analyze', async (request, reply) => {
    const parsed = AnalyzeBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: formatZodIssues(parsed.error) } });
    }

    const body = parsed.data;
    const result = runAnalysis(
      {
        historical: tableFromInput(body.historical),
        incoming: body.incoming ? tableFromInput(body.incoming) : undefined,
        period: body.period,
        topN: body.top_n ?? ctx.topN,
      },
      { predictor: ctx.predictor, cache: ctx.cache }
    );

    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send(serializeAnalysis(result.result));
  });

  server.post('/api/movers', async (request, reply) => {
    const parsed = MoversBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: formatZodIssues(parsed.error) } });
    }

    const body = parsed.data;
    const result = runMovers({
      historical: tableFromInput(body.historical),
      incoming: body.incoming ? tableFromInput(body.incoming) : undefined,
      period: body.period,
      topN: body.top_n ?? ctx.topN,
      metric: body.metric,
      direction: body.direction,
    });

    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send({ metric: body.metric, direction: body.direction, movers: result.result });
  });
}

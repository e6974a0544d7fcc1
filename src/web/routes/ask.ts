import type { FastifyInstance } from 'fastify';
import { runAsk } from '../../core/analysis-engine.js';
import { AskBodySchema, errorToHttpStatus, formatZodIssues, tableFromInput } from '../serialization.js';
import type { RouteContext } from './context.js';

export function registerAskRoutes(server: FastifyInstance, ctx: RouteContext) {
  server.post('/api/ask', async (request, reply) => {
    const parsed = AskBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: { type: 'validation', message: formatZodIssues(parsed.error) } });
    }

    const body = parsed.data;
    const result = runAsk({
      historical: tableFromInput(body.historical),
      incoming: body.incoming ? tableFromInput(body.incoming) : undefined,
      period: body.period,
      topN: body.top_n ?? ctx.topN,
      question: body.question,
    });

    if (!result.success) {
      return reply.status(errorToHttpStatus(result.error.type)).send({ error: result.error });
    }

    return reply.send({
      question: body.question,
      intent: result.result.intent,
      period: result.result.period,
      answer: result.result.text,
    });
  });
}

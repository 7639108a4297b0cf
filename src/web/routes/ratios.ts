import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { runRatioPipeline } from '../../core/pipeline.js';
import { DEFAULT_QUARTER, DEFAULT_YEAR } from '../../core/config.js';
import { errorToHttpStatus, serializeRatioTable } from '../serialization.js';

const flag = z.enum(['true', 'false', '1', '0']).transform(v => v === 'true' || v === '1');

const ratioQuerySchema = z.object({
  year: z.coerce.number().int().default(DEFAULT_YEAR),
  quarter: z.string().toUpperCase().regex(/^Q[1-4]$/, 'quarter must be Q1-Q4').default(DEFAULT_QUARTER),
  defaultValue: z.coerce.number().finite().default(0),
  log: flag.default('false'),
  industry: flag.default('false'),
});

export function registerRatioRoutes(server: FastifyInstance, dataDir: string, sicCodesUrl: string) {
  server.get('/api/ratios', async (request, reply) => {
    const parsed = ratioQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      const message = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
      return reply.status(400).send({ error: { type: 'invalid_params', message } });
    }

    const { year, quarter, defaultValue, log, industry } = parsed.data;
    const outcome = await runRatioPipeline({
      dataDir,
      year,
      quarter,
      defaultValue,
      includeLog: log,
      includeIndustry: industry,
      sicCodesUrl,
    });

    if (!outcome.success) {
      return reply.status(errorToHttpStatus(outcome.error.type)).send({ error: outcome.error });
    }

    return reply.send(serializeRatioTable(outcome.result));
  });
}

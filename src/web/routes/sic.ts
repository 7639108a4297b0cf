import type { FastifyInstance } from 'fastify';
import { fetchSicCodes } from '../../core/sic-client.js';
import { classifyError } from '../../core/pipeline.js';
import { errorToHttpStatus, serializeSicCodes } from '../serialization.js';

export function registerSicRoutes(server: FastifyInstance, sicCodesUrl: string) {
  server.get('/api/sic-codes', async (_request, reply) => {
    try {
      const codes = await fetchSicCodes(sicCodesUrl);
      return reply.send(serializeSicCodes(codes));
    } catch (err) {
      const error = classifyError(err);
      return reply.status(errorToHttpStatus(error.type)).send({ error });
    }
  });
}

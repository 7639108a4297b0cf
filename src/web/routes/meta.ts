import type { FastifyInstance } from 'fastify';
import { CONCEPT_DEFINITIONS } from '../../processing/concept-definitions.js';
import { RATIO_DEFINITIONS } from '../../processing/ratio-definitions.js';
import { serializeConcepts, serializeRatioDefinitions } from '../serialization.js';

export function registerMetaRoutes(server: FastifyInstance) {
  server.get('/api/concepts', async () => serializeConcepts(CONCEPT_DEFINITIONS));

  server.get('/api/ratio-definitions', async () => serializeRatioDefinitions(RATIO_DEFINITIONS));
}

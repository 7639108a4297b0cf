import Fastify, { type FastifyInstance } from 'fastify';
import { DATA_DIR, SIC_CODES_URL } from '../core/config.js';
import { registerMetaRoutes } from './routes/meta.js';
import { registerRatioRoutes } from './routes/ratios.js';
import { registerSicRoutes } from './routes/sic.js';

export interface ServerOptions {
  dataDir?: string;
  sicCodesUrl?: string;
}

export function buildServer(options: ServerOptions = {}): FastifyInstance {
  const server = Fastify({ logger: false });

  const dataDir = options.dataDir ?? DATA_DIR;
  const sicCodesUrl = options.sicCodesUrl ?? SIC_CODES_URL;

  registerMetaRoutes(server);
  registerRatioRoutes(server, dataDir, sicCodesUrl);
  registerSicRoutes(server, sicCodesUrl);

  server.setErrorHandler((error: Error, _request, reply) => {
    console.error('Server error:', error.message);
    void reply.status(500).send({ error: { type: 'internal', message: 'Internal server error' } });
  });

  return server;
}

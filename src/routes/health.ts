// Health routes
import type { FastifyInstance } from 'fastify';
import { API_VERSION } from '../env.js';
import { resolveDb, type DbPluginOptions } from '../db.js';

export async function healthRoutes(server: FastifyInstance, opts: DbPluginOptions) {
  // GET / - Liveness; never touches the database
  server.get('/', async () => {
    return {
      status: 'online',
      version: API_VERSION,
    };
  });

  // GET /health - Readiness, including a database round-trip
  server.get('/health', async (request, reply) => {
    const timestamp = new Date().toISOString();

    try {
      resolveDb(opts).prepare('SELECT 1').get();
    } catch (err) {
      request.log.error({ err }, 'database health check failed');
      return reply.code(503).send({
        status: 'degraded',
        database: 'unavailable',
        timestamp,
        version: API_VERSION,
      });
    }

    return {
      status: 'ok',
      database: 'ok',
      timestamp,
      version: API_VERSION,
    };
  });
}

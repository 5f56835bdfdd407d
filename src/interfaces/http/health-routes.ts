import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

type Check = 'ok' | 'unreachable' | 'disabled';

/**
 * GET /api/v1/health: storage and Redis reachability.
 *
 * Redis is optional (the in-memory driver runs without it) and reports
 * `disabled` when not registered.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      let storage: Check = 'ok';
      try {
        await fastify.storage.ping();
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Storage health check failed');
        storage = 'unreachable';
      }

      let redis: Check = 'disabled';
      if (fastify.hasDecorator('redis')) {
        try {
          await fastify.redis.ping();
          redis = 'ok';
        } catch (err: unknown) {
          fastify.log.error({ err }, 'Redis health check failed');
          redis = 'unreachable';
        }
      }

      const healthy = storage === 'ok' && redis !== 'unreachable';
      return reply
        .status(healthy ? 200 : 503)
        .send({ status: healthy ? 'ok' : 'degraded', storage, redis });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['reporting'],
  fastify: '5.x',
});

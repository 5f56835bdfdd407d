import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  url: string;
}

/**
 * Fastify plugin that manages the ioredis connection lifecycle.
 *
 * - Connects on server start, disconnects on close.
 * - Decorates `fastify.redis` for the cache, the freeze notifier and health.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await redis.connect();
  fastify.log.info('Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.redis` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}

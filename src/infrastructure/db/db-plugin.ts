import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database } from './client.js';
import { ensureSchema } from './migrate.js';

export interface DbPluginOptions {
  databaseUrl: string;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Ensures the schema, decorates `fastify.db` and closes the connection pool
 * on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.databaseUrl);

  await ensureSchema(sql);
  fastify.log.info('Database ready (activity_events + reports tables)');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}

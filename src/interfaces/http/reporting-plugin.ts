import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ReportingStorage } from '../../domain/index.js';
import type { ReportLifecycle } from '../../application/index.js';

export interface ReportingPluginOptions {
  storage: ReportingStorage;
  lifecycle: ReportLifecycle;
}

/**
 * Decorates `fastify.storage` and `fastify.lifecycle` for the routes.
 *
 * The caller builds both, so the API runs against Postgres or the in-memory
 * store alike.
 */
async function reportingPlugin(fastify: FastifyInstance, opts: ReportingPluginOptions): Promise<void> {
  fastify.decorate('storage', opts.storage);
  fastify.decorate('lifecycle', opts.lifecycle);
}

export default fp(reportingPlugin, {
  name: 'reporting',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    storage: ReportingStorage;
    lifecycle: ReportLifecycle;
  }
}

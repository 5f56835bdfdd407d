import type { FastifyInstance } from 'fastify';
import errorHandler from './error-handler.js';
import reportingPlugin from './reporting-plugin.js';
import type { ReportingPluginOptions } from './reporting-plugin.js';
import eventRoutes from './event-routes.js';
import reportRoutes from './report-routes.js';
import healthRoutes from './health-routes.js';

/** Registers the error mapping, the reporting decorators and every route. */
export async function registerApi(fastify: FastifyInstance, opts: ReportingPluginOptions): Promise<void> {
  await fastify.register(errorHandler);
  await fastify.register(reportingPlugin, opts);
  await fastify.register(eventRoutes);
  await fastify.register(reportRoutes);
  await fastify.register(healthRoutes);
}

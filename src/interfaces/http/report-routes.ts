import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  listFrozenReports,
  getReport,
  getReportEvents,
  getActiveReportSnapshot,
  acknowledgeDelivery,
} from '../../application/index.js';
import { parseId, safeInt } from './params.js';

/**
 * Report routes.
 *
 * GET  /api/v1/reports                      frozen reports, newest first
 * GET  /api/v1/reports/active               open report + pending counts
 * GET  /api/v1/reports/:report_id           single report
 * GET  /api/v1/reports/:report_id/events    events claimed by a report
 * POST /api/v1/reports/freeze               manual freeze trigger
 * POST /api/v1/reports/:report_id/emailed   delivery acknowledgement
 *
 * Lifecycle errors thrown here are mapped by the error-handler plugin.
 */
async function reportRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/reports',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string; offset?: string } }>,
      reply: FastifyReply,
    ) => {
      const limit = safeInt(request.query.limit);
      const offset = safeInt(request.query.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      const result = await listFrozenReports(fastify.storage, { limit, offset });
      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/reports/active',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = await getActiveReportSnapshot(fastify.storage, fastify.lifecycle);
      return reply.status(200).send(snapshot);
    },
  );

  fastify.get(
    '/api/v1/reports/:report_id',
    async (
      request: FastifyRequest<{ Params: { report_id: string } }>,
      reply: FastifyReply,
    ) => {
      const reportId = parseId(request.params.report_id);
      if (reportId === null) {
        return reply.status(400).send({ error: 'report_id must be a positive integer' });
      }

      const report = await getReport(fastify.storage, reportId);
      if (report === null) {
        return reply.status(404).send({ error: 'Report not found' });
      }

      return reply.status(200).send(report);
    },
  );

  fastify.get(
    '/api/v1/reports/:report_id/events',
    async (
      request: FastifyRequest<{ Params: { report_id: string }; Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const reportId = parseId(request.params.report_id);
      if (reportId === null) {
        return reply.status(400).send({ error: 'report_id must be a positive integer' });
      }
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const events = await getReportEvents(fastify.storage, reportId, limit);
      if (events === null) {
        return reply.status(404).send({ error: 'Report not found' });
      }

      return reply.status(200).send({ report_id: reportId, data: events });
    },
  );

  fastify.post(
    '/api/v1/reports/freeze',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const reportId = await fastify.lifecycle.freezeCurrentReport();
      const active = await fastify.storage.reports.findActive();

      request.log.info({ report_id: reportId }, 'Manual freeze completed');
      return reply.status(200).send({ report_id: reportId, active_report_id: active?.id ?? null });
    },
  );

  fastify.post(
    '/api/v1/reports/:report_id/emailed',
    async (
      request: FastifyRequest<{ Params: { report_id: string } }>,
      reply: FastifyReply,
    ) => {
      const reportId = parseId(request.params.report_id);
      if (reportId === null) {
        return reply.status(400).send({ error: 'report_id must be a positive integer' });
      }

      const acknowledged = await acknowledgeDelivery(fastify.storage, reportId);
      if (!acknowledged) {
        return reply.status(404).send({ error: 'Frozen report not found' });
      }

      return reply.status(204).send();
    },
  );
}

export default fp(reportRoutes, {
  name: 'report-routes',
  dependencies: ['reporting'],
  fastify: '5.x',
});

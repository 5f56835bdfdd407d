import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  trackEvent,
  listEvents,
  listRecentEvents,
  countEvents,
  getLastEvent,
} from '../../application/index.js';
import { parseId, safeInt } from './params.js';

/**
 * Registers the event routes.
 *
 * POST /api/v1/events         append one event
 * GET  /api/v1/events         events of a report (or unassigned), newest first
 * GET  /api/v1/events/recent  newest unassigned events (cached)
 * GET  /api/v1/events/counts  counts by type
 * GET  /api/v1/events/last    newest event for an object (throttling)
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Event ingestion.
   *
   * Validates, appends synchronously, returns 201 with the new id.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const result = await trackEvent(fastify.storage.events, request.body);

      if (!result.ok) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: result.issues,
        });
      }

      return reply.status(201).send({ event_id: result.event_id });
    },
  );

  /**
   * GET /api/v1/events
   *
   * Query params: report_id (omitted = unassigned), limit, offset
   */
  fastify.get(
    '/api/v1/events',
    async (
      request: FastifyRequest<{
        Querystring: { report_id?: string; limit?: string; offset?: string };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      const offset = safeInt(q.offset);

      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (offset !== undefined && Number.isNaN(offset)) {
        return reply.status(400).send({ error: 'offset must be an integer' });
      }

      let reportId: number | null = null;
      if (q.report_id !== undefined) {
        reportId = parseId(q.report_id);
        if (reportId === null) {
          return reply.status(400).send({ error: 'report_id must be a positive integer' });
        }
      }

      const result = await listEvents(fastify.storage.events, { report_id: reportId, limit, offset });
      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/v1/events/recent',
    async (request: FastifyRequest<{ Querystring: { limit?: string } }>, reply: FastifyReply) => {
      const limit = safeInt(request.query.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }

      const data = await listRecentEvents(fastify.storage.events, limit);
      return reply.status(200).send({ data });
    },
  );

  fastify.get(
    '/api/v1/events/counts',
    async (request: FastifyRequest<{ Querystring: { report_id?: string } }>, reply: FastifyReply) => {
      let reportId: number | null = null;
      if (request.query.report_id !== undefined) {
        reportId = parseId(request.query.report_id);
        if (reportId === null) {
          return reply.status(400).send({ error: 'report_id must be a positive integer' });
        }
      }

      const totals = await countEvents(fastify.storage.events, reportId);
      return reply.status(200).send({ report_id: reportId, totals });
    },
  );

  fastify.get(
    '/api/v1/events/last',
    async (
      request: FastifyRequest<{ Querystring: { event_type?: string; object_id?: string } }>,
      reply: FastifyReply,
    ) => {
      const { event_type, object_id } = request.query;
      if (event_type === undefined || event_type === '' || object_id === undefined || object_id === '') {
        return reply.status(400).send({ error: 'event_type and object_id are required' });
      }

      const event = await getLastEvent(fastify.storage.events, event_type, object_id);
      if (event === null) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      return reply.status(200).send(event);
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['reporting'],
  fastify: '5.x',
});

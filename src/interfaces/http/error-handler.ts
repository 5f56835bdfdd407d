import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { ZodError } from 'zod';
import { PersistenceError, isReportLifecycleError } from '../../domain/index.js';

/**
 * Maps lifecycle errors to HTTP responses.
 *
 * - ZodError → 400
 * - PersistenceError (including RolloverFailedError) → 503
 * - NoActiveReport / AlreadyFrozen / InvariantViolation → 409
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({ error: 'Validation failed', issues: error.issues });
    }

    if (error instanceof PersistenceError) {
      request.log.error({ err: error, operation: error.operation }, 'Storage failure');
      return reply.status(503).send({ error: error.message, code: error.code });
    }

    if (isReportLifecycleError(error)) {
      request.log.warn({ code: error.code }, error.message);
      return reply.status(409).send({ error: error.message, code: error.code });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
      return reply.status(statusCode).send({ error: 'Internal Server Error' });
    }
    return reply.status(statusCode).send({ error: error.message });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});

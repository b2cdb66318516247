import fp from 'fastify-plugin';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { RegistrationInvalidError, isEngineError } from '../../domain/index.js';
import type { EngineError, EngineErrorCode } from '../../domain/index.js';

const STATUS_BY_CODE: Record<EngineErrorCode, number> = {
  REGISTRATION_INVALID: 400,
  FILTER_EVALUATION: 400,
  FUNCTION_NOT_FOUND: 404,
  VERSION_CONFLICT: 409,
  LEASE_EXPIRED: 409,
  RESOURCE_EXCEEDED: 422,
  SOURCE_UNAVAILABLE: 503,
};

export function statusFor(err: EngineError): number {
  return STATUS_BY_CODE[err.code];
}

function bodyFor(err: EngineError): Record<string, unknown> {
  if (err instanceof RegistrationInvalidError) {
    return { error: 'Validation failed', code: err.code, issues: err.issues };
  }
  return { error: err.message, code: err.code };
}

/**
 * Maps engine errors thrown by route handlers to HTTP responses.
 *
 * RegistrationInvalid → 400, FunctionNotFound → 404,
 * VersionConflict / LeaseExpired → 409. Anything else keeps Fastify's own
 * status when it is a client error and is a logged 500 otherwise.
 */
async function errorHandler(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((err: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    if (isEngineError(err)) {
      const status = statusFor(err);
      if (status >= 500) request.log.error({ err }, 'Request failed');
      return reply.status(status).send(bodyFor(err));
    }

    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }

    request.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({ error: 'Internal Server Error' });
  });
}

export default fp(errorHandler, {
  name: 'error-handler',
  fastify: '5.x',
});

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { AppError, type ErrorKind } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

function send(reply: FastifyReply, statusCode: number, kind: ErrorKind, message: string) {
  return reply.status(statusCode).send({
    error: { kind, message, statusCode },
  });
}

async function errorHandlerPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.setErrorHandler((error: FastifyError, _request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof AppError) {
      return send(reply, error.statusCode, error.kind, error.message);
    }

    // Schema validation of the request, or a body that is not JSON at all
    if (error.validation || error.code?.startsWith('FST_ERR_CTP_')) {
      return send(reply, error.statusCode ?? 400, 'ProtocolError', error.message);
    }

    // Other client errors raised by Fastify or its plugins (e.g. rate limiting)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return send(reply, error.statusCode, 'ProtocolError', error.message);
    }

    logger.error({ err: error }, 'Unhandled error');

    return send(reply, 500, 'InternalError', 'Internal server error');
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
});

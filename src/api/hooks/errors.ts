import type { FastifyError, FastifyInstance } from 'fastify';
import { AppError, type ErrorCode, type ErrorEnvelope } from '../../lib/errors';

function envelope(code: ErrorCode, message: string, details?: unknown): ErrorEnvelope {
  return { error: { code, message, ...(details === undefined ? {} : { details }) } };
}

/** Every failure leaves the API as `{ error: { code, message, details? } }`; stacks never do. */
export function registerErrorHandlers(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        req.log.warn({ code: err.code, err: err.message }, 'Request failed');
      }
      return reply.status(err.statusCode).send(err.toEnvelope());
    }
    if (err.statusCode === 429) {
      return reply.status(429).send(envelope('RATE_LIMITED', err.message));
    }
    if (err.validation) {
      return reply.status(400).send(envelope('VALIDATION_ERROR', err.message, err.validation));
    }
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.status(err.statusCode).send(envelope('VALIDATION_ERROR', err.message));
    }
    req.log.error({ err }, 'Unhandled error');
    return reply.status(500).send(envelope('INTERNAL_ERROR', 'Internal server error'));
  });

  app.setNotFoundHandler((req, reply) => {
    return reply.status(404).send(envelope('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}

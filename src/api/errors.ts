import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { DataIntegrityError, FeedError, NotFoundError } from '../core/errors.js';
import { logger } from '../utils/logger.js';

export interface ErrorBody {
  ok: false;
  error: { code: string; message: string; details?: unknown };
}

export function toHttpError(err: unknown): { status: number; body: ErrorBody } {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: { ok: false, error: { code: 'VALIDATION_ERROR', message: 'Invalid request data', details: err.issues } },
    };
  }
  if (err instanceof NotFoundError) {
    return { status: 404, body: { ok: false, error: { code: err.code, message: err.message } } };
  }
  if (err instanceof DataIntegrityError) {
    return { status: 409, body: { ok: false, error: { code: err.code, message: err.message } } };
  }
  if (err instanceof FeedError) {
    return { status: 503, body: { ok: false, error: { code: err.code, message: err.message } } };
  }
  return {
    status: 500,
    body: { ok: false, error: { code: 'INTERNAL_SERVER_ERROR', message: 'An unexpected error occurred.' } },
  };
}

export function errorHandler(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  // fastify's own client errors (bad JSON, wrong content type) keep their status
  if (!(err instanceof FeedError) && err.statusCode !== undefined && err.statusCode < 500) {
    return reply
      .status(err.statusCode)
      .send({ ok: false, error: { code: err.code, message: err.message } } satisfies ErrorBody);
  }
  const { status, body } = toHttpError(err);
  if (status >= 500) logger.error({ err, url: req.url }, 'Request failed');
  else logger.warn({ code: body.error.code, url: req.url }, body.error.message);
  return reply.status(status).send(body);
}

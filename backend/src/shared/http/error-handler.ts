/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - Every failure must reach the client as the same envelope:
 *     { status: 'error', error: <message>, code: <AppErrorCode> }
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status and .code.
 * - Fastify client errors (malformed JSON, unsupported media type) → their 4xx.
 * - Unknown routes → 404 envelope.
 * - Unexpected errors → 500 with generic message.
 * - Log all errors with request context.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { fail } from './envelope';
import { withRequestContext } from '../logger/with-context';

const SENSITIVE_META_KEYS = new Set([
  'token',
  'accessToken',
  'refreshToken',
  'authorization',
  'actionLink',
  'password',
  'secret',
  'apiKey',
]);

function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

function clientErrorStatus(err: FastifyError): number | null {
  const status = err.statusCode;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return null;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(fail(err.code, err.message));
    }

    // 2) Framework-level client errors (body parsing, content type)
    const status = clientErrorStatus(err);
    if (status !== null) {
      log.warn('client_error', {
        flow: 'http.error',
        status,
        fastifyCode: err.code,
        message: err.message,
      });

      return reply.status(status).send(fail('VALIDATION_ERROR', err.message));
    }

    // 3) Unexpected errors — never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(fail('INTERNAL', 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    return reply.status(404).send(fail('NOT_FOUND', `Route ${req.method} ${req.url} not found`));
  });
}

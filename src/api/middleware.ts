/**
 * API Middleware: actor resolution and error handling.
 */

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { DeckhandError, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

export const ACTOR_HEADER = 'x-deckhand-actor';

/** Who is acting on a request; recorded in the audit trail. */
export function actorOf(req: Request): string {
  const header = req.headers[ACTOR_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() !== '' ? value.trim() : 'api';
}

/** Forward rejections from an async handler to the error handler. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof DeckhandError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  // Malformed JSON bodies from express.json().
  if (err instanceof SyntaxError) {
    res.status(400).json(
      apiError(createTypedError({ code: 'MANIFEST.INVALID', message: `Malformed request body: ${err.message}` })),
    );
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(apiError(createTypedError({ code: 'SYSTEM.INTERNAL', message })));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('MANIFEST.') || error.code.startsWith('INVENTORY.') || error.code.startsWith('STORE.')) return 400;
  if (error.code === 'RUN.ALREADY_RUNNING' || error.code === 'RUN.ALREADY_FINISHED') return 409;
  if (error.code.startsWith('GRAPH.') || error.code.startsWith('RUN.')) return 422;
  return 500;
}

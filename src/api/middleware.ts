/**
 * API middleware: identity, error mapping, and callback body parsing.
 */

import express, { Request, Response, NextFunction } from 'express';
import { AuthConfig } from '../config';
import {
  ServiceError,
  apiError,
  httpStatusFor,
  internalError,
  unauthenticatedError,
  validationError,
} from '../domain/errors';
import { verifyAccessToken } from './auth';
import { logger, errorContext } from '../logger';

/** Request carrying the verified caller. */
export interface AuthenticatedRequest extends Request {
  userId?: string;
}

/** Reject requests without a valid bearer token; otherwise set `req.userId`. */
export function requireIdentity(config: AuthConfig) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
    const header = req.headers.authorization ?? '';
    const [scheme, token] = header.split(' ');
    if (scheme?.toLowerCase() !== 'bearer' || !token) {
      res.set('WWW-Authenticate', 'Bearer');
      res.status(401).json(apiError(unauthenticatedError('Bearer token required')));
      return;
    }

    const verification = verifyAccessToken(token, config);
    if (!verification.ok) {
      res.set('WWW-Authenticate', 'Bearer error="invalid_token"');
      res.status(401).json(apiError(unauthenticatedError(verification.reason)));
      return;
    }

    req.userId = verification.userId;
    next();
  };
}

/** The verified user id; throws when a route is mounted without requireIdentity. */
export function callerId(req: AuthenticatedRequest): string {
  if (!req.userId) {
    throw new ServiceError(unauthenticatedError('Authentication required'));
  }
  return req.userId;
}

/**
 * JSON parsing that never fails the request. Used on the provider webhook,
 * which must always be acknowledged; an unparsable body reaches the handler
 * as `undefined`.
 */
export function lenientJson(limit = '1mb') {
  const parse = express.json({ limit });
  return (req: Request, res: Response, next: NextFunction) => {
    parse(req, res, (err?: unknown) => {
      if (err) {
        logger.warn('Unparsable webhook body', { path: req.path, ...errorContext(err) });
        req.body = undefined;
      }
      next();
    });
  };
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (err instanceof ServiceError) {
    const status = httpStatusFor(err.typedError);
    const log = status >= 500 ? logger.error : logger.warn;
    log('Request error', { code: err.code, status, taskId: err.typedError.taskId });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (err instanceof SyntaxError) {
    res.status(400).json(apiError(validationError('Request body is not valid JSON')));
    return;
  }

  logger.error('Unhandled request error', {
    ...errorContext(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(internalError('Internal server error')));
}

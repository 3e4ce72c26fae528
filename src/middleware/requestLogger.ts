/**
 * Request logging middleware
 *
 * Gives every request a child logger tagged with a request id (taken from
 * X-Request-Id when the caller sends one) and stores it on res.locals for
 * the route handlers.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import logger, { createChildLogger, type Logger } from '../config/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Locals {
      requestId: string;
      requestLogger: Logger;
    }
  }
}

export const requestLogging =
  (server: string): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header('x-request-id') || uuidv4();
    const requestLogger = createChildLogger({ requestId, server });

    requestLogger.info({ method: req.method, path: req.path }, 'Incoming request');

    res.locals.requestId = requestId;
    res.locals.requestLogger = requestLogger;
    res.setHeader('X-Request-Id', requestId);

    next();
  };

/**
 * Logger for the current request, the root logger before requestLogging ran
 */
export const loggerFor = (res: Response): Logger =>
  res.locals.requestLogger ?? logger;

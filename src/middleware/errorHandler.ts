import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError, RequestCancelledError } from '../errors/index.js';

interface ErrorBody {
  message: string;
  status: number;
  code?: string;
  stack?: string;
}

function describeRequest(req: Request): Record<string, unknown> {
  return {
    method: req.method,
    url: req.url,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };
}

function toBody(error: Error): ErrorBody {
  if (!(error instanceof ApplicationError)) {
    return { message: 'Internal server error', status: 500 };
  }
  return {
    // Non-operational errors are bugs or bad deployments; their text stays in the log
    message: error.isOperational ? error.message : 'Internal server error',
    status: error.statusCode,
    code: error.code,
  };
}

/**
 * Last middleware in the chain. Answers `{ error: { message, status, code } }`
 * and logs client errors at warn, everything else at error.
 */
export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const request = describeRequest(req);

  if (error instanceof RequestCancelledError && req.socket.destroyed) {
    // Nobody is left to read the response
    logger.info('Request cancelled by client', { request });
    return;
  }

  if (error instanceof ApplicationError) {
    logger.log(error.statusCode < 500 ? 'warn' : 'error', 'Request error', {
      error: error.toJSON(),
      request,
    });
  } else {
    logger.error('Request error (generic)', {
      error: { name: error.name, message: error.message, stack: error.stack },
      request,
    });
  }

  const body = toBody(error);
  if (process.env.NODE_ENV === 'development' && error.stack) {
    body.stack = error.stack;
  }

  res.status(body.status).json({ error: body });
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      status: 404,
    },
  });
};

import type { Request, Response, NextFunction } from 'express';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { logger } from '../utils/logger.js';

function statusOf(err: unknown): number {
  if (err && typeof err === 'object') {
    const candidate = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
    const n = Number(candidate);
    if (Number.isInteger(n) && n >= 400 && n < 600) return n;
  }
  return 500;
}

/** 404 handler placed after all route mounts */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(ResponseUtils.notFound('endpoint'));
}

/** Central error handler - MUST have 4 args to be recognized by Express */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error ? err.message : String(err);

  let response;
  if (status === 404) {
    response = ResponseUtils.notFound('resource');
  } else if (status >= 500) {
    // Avoid leaking internal details
    response = ResponseUtils.internalError();
  } else {
    response = ResponseUtils.error(message || 'Request failed');
  }

  logger.error({
    err: {
      message,
      name: err instanceof Error ? err.name : undefined,
      stack: err instanceof Error ? err.stack : undefined,
      status
    },
    url: req.originalUrl,
    method: req.method
  }, 'request_error');

  res.status(status).json(response);
}

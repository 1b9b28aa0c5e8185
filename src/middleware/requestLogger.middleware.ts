import type { Request, Response, NextFunction } from 'express';
import { getRequestContext } from '../lib/requestContext';

export type ApiRequestLogLine = {
  event: 'po_api_request';
  requestId?: string;
  reviewId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  requestBytes: number;
  timestamp: string;
};

export function buildRequestLogLine(
  req: Pick<Request, 'method' | 'originalUrl' | 'headers' | 'requestId'>,
  status: number,
  durationMs: number,
  reviewId?: string
): ApiRequestLogLine {
  return {
    event: 'po_api_request',
    requestId: req.requestId,
    ...(reviewId ? { reviewId } : {}),
    method: req.method,
    path: req.originalUrl.split('?')[0],
    status,
    durationMs,
    requestBytes: Number(req.headers['content-length'] ?? 0) || 0,
    timestamp: new Date().toISOString()
  };
}

/**
 * Writes one JSON line per finished request. Must run after
 * requestContextMiddleware so the review id tagged during the request is seen.
 */
export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const startedAt = process.hrtime.bigint();
  const context = getRequestContext();

  res.on('finish', () => {
    const durationMs = Number((process.hrtime.bigint() - startedAt) / 1_000_000n);
    console.log(JSON.stringify(buildRequestLogLine(req, res.statusCode, durationMs, context?.reviewId)));
  });

  next();
}

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../lib/requestContext';

// Caller-supplied ids are echoed into logs, so only plain tokens are accepted.
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export function resolveRequestId(header: string | undefined): string {
  const candidate = header?.trim() ?? '';
  return REQUEST_ID_PATTERN.test(candidate) ? candidate : uuidv4();
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = resolveRequestId(req.header('x-request-id') ?? req.header('x-correlation-id'));
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);
  runWithRequestContext({ requestId }, next);
}

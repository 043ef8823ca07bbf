import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';

// Echoed in responses and written to logs: plain tokens only
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Take the caller's `x-request-id` when it is a plain token, otherwise mint one.
 * Repeated headers use the first value.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const candidate = Array.isArray(header) ? header[0] : header;
  return candidate !== undefined && REQUEST_ID_PATTERN.test(candidate) ? candidate : uuid();
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = resolveRequestId(req.headers['x-request-id']);
  req.id = requestId;
  res.setHeader('x-request-id', requestId);
  next();
}

// src/middleware/correlation.ts: correlation ID per request, echoed back and available to handlers via res.locals
import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

const HEADER = 'x-correlation-id';
const MAX_INBOUND_LENGTH = 128;

export function attachCorrelationId(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header(HEADER)?.trim();
  const correlationId =
    headerId && headerId.length <= MAX_INBOUND_LENGTH ? headerId : randomUUID();

  res.locals.correlationId = correlationId;
  res.setHeader(HEADER, correlationId);
  next();
}

export function correlationIdOf(res: Response): string | undefined {
  const id: unknown = res.locals.correlationId;
  return typeof id === 'string' ? id : undefined;
}

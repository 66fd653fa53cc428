import type { Response } from 'express';
import { describeError, isRiskScanError } from '@riskscan/core';
import type { Logger } from '@riskscan/core';

/**
 * Write an error as JSON. Expected failures carry their own status and code;
 * anything else is logged and answered with a bare 500.
 */
export function sendError(res: Response, err: unknown, logger: Logger): void {
  if (isRiskScanError(err)) {
    res.status(err.httpStatus).json({
      error: err.code,
      message: err.message,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }

  logger.error('Unhandled request error', { error: describeError(err) });
  res.status(500).json({ error: 'INTERNAL_ERROR', message: 'Internal server error' });
}

/**
 * Numeric query or body value. Absent and blank values are undefined;
 * unparseable ones come back as NaN for the caller to reject.
 */
export function readNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    return value.trim() === '' ? undefined : Number(value);
  }
  if (value === undefined || value === null) return undefined;
  return Number.NaN;
}

export function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

import type { Response } from 'express';
import { ValidationError, isAppError } from './errors';
import { Logger } from './logger';
import type { LogData } from './logger';
import { isPositiveInteger, parseIdentifier } from './validation';

/** First value of a query parameter when it is a plain string. */
export function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return queryString(value[0]);
  }
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function queryInteger(value: unknown): number | undefined {
  const text = queryString(value);
  if (text === undefined) {
    return undefined;
  }
  const parsed = parseInt(text, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function queryOption<T extends string>(value: unknown, options: readonly T[]): T | undefined {
  const text = queryString(value);
  return options.find(option => option === text);
}

export function requireId(value: unknown, field = 'id'): number {
  const id = parseIdentifier(value);
  if (!isPositiveInteger(id)) {
    throw new ValidationError([`${field} must be a positive integer`]);
  }
  return id;
}

/**
 * AppErrors carry their own status and body. Anything else is logged and
 * reported as a 500 without internals.
 */
export function sendError(res: Response, error: unknown, message: string, data?: LogData): void {
  if (isAppError(error)) {
    if (error.statusCode >= 500) {
      Logger.error(message, error, data);
    } else {
      Logger.warn(message, { ...data, error: error.message, code: error.code });
    }
    res.status(error.statusCode).json(error.toJSON());
    return;
  }

  Logger.error(message, error, data);
  res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
}

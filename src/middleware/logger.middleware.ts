import type { Request, Response, NextFunction } from 'express';
import { Logger } from '../utils/logger';
import type { LogData } from '../utils/logger';

const MAX_LOGGED_BODY = 1000;
const MAX_LOGGED_RESPONSE = 2000;

function hasKeys(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}

function limitForLog(value: unknown, max: number, placeholder: string): unknown {
  const serialized: string | undefined = JSON.stringify(value);
  return serialized !== undefined && serialized.length > max ? placeholder : value;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const { method, originalUrl, params, query } = req;
  const body: unknown = req.body;
  const ip = req.ip || req.socket.remoteAddress;

  const requestData: LogData = {};
  if (hasKeys(params)) {
    requestData.params = params;
  }
  if (hasKeys(query)) {
    requestData.query = query;
  }
  if (hasKeys(body)) {
    requestData.body = limitForLog(body, MAX_LOGGED_BODY, '[Body too large to log]');
  }

  Logger.info('📥 Incoming Request', { method, url: originalUrl, ip, ...requestData });

  // JSON responses are captured so error bodies show up in the log
  let responseBody: unknown;
  const originalJson = res.json.bind(res);
  res.json = (payload?: unknown): Response => {
    responseBody = payload;
    return originalJson(payload);
  };

  res.on('finish', () => {
    const { statusCode } = res;
    const responseData: LogData = {
      method,
      url: originalUrl,
      statusCode,
      duration: `${Date.now() - startTime}ms`,
      ip,
    };
    if (responseBody !== undefined) {
      responseData.responseBody = limitForLog(responseBody, MAX_LOGGED_RESPONSE, '[Response too large to log]');
    }

    if (statusCode >= 500) {
      Logger.error(`❌ ${statusCode} Server Error`, undefined, responseData);
    } else if (statusCode >= 400) {
      Logger.warn(`⚠️  ${statusCode} Client Error`, responseData);
    } else if (statusCode >= 300) {
      Logger.info(`↪️  ${statusCode} Redirect`, responseData);
    } else {
      Logger.info(`✅ ${statusCode} Success`, responseData);
    }
  });

  next();
}

export function errorLogger(error: Error, req: Request, res: Response, next: NextFunction): void {
  const { method, originalUrl, params, query } = req;
  const body: unknown = req.body;

  Logger.error('💥 Unhandled Error in Request', error, {
    method,
    url: originalUrl,
    ip: req.ip || req.socket.remoteAddress,
    params: hasKeys(params) ? params : undefined,
    query: hasKeys(query) ? query : undefined,
    body: hasKeys(body) ? limitForLog(body, MAX_LOGGED_BODY, '[Body too large to log]') : undefined,
  });

  next(error);
}

import { Request, Response, NextFunction } from 'express';
import { createServiceLogger } from '@shopper-insights/shared';

const logger = createServiceLogger('insights-api');

// Generate unique request ID
const generateRequestId = (): string => {
  return `req_${Date.now()}_${Math.random().toString(36).substring(2, 15)}`;
};

// Request logger middleware
export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  if (!req.headers['x-request-id']) {
    req.headers['x-request-id'] = generateRequestId();
  }

  logger.debug('Incoming Request', {
    requestId: req.headers['x-request-id'],
    method: req.method,
    url: req.url,
    userAgent: req.get('User-Agent'),
    ip: req.ip,
  });

  res.on('finish', () => {
    const logData = {
      requestId: req.headers['x-request-id'],
      method: req.method,
      url: req.url,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      ip: req.ip,
    };

    // Log based on status code
    if (res.statusCode >= 500) {
      logger.error('Server Error Response', logData);
    } else if (res.statusCode >= 400) {
      logger.warn('Client Error Response', logData);
    } else {
      logger.info('Success Response', logData);
    }
  });

  next();
};

// Skip logging for probe endpoints
export const skipLogger = (paths: string[]) => {
  return (req: Request, res: Response, next: NextFunction) => {
    if (paths.some((path) => req.path === path || req.path.startsWith(`${path}/`))) {
      return next();
    }
    return requestLogger(req, res, next);
  };
};

export default requestLogger;

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { RequestMetadata } from '../types/logging.js';

// Extend Express Request type to include metadata
declare global {
  namespace Express {
    interface Request {
      metadata?: RequestMetadata;
    }
  }
}

export interface LoggerOptions {
  /** Write one [HTTP] line per finished response */
  logRequests: boolean;
}

function clientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const header = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  return (header || req.socket.remoteAddress || 'unknown').split(',')[0].trim();
}

export function loggerMiddleware({ logRequests }: LoggerOptions): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming ? incoming : uuidv4();

    req.metadata = {
      request_id: requestId,
      ip_address: clientIp(req),
      user_agent: req.headers['user-agent'] || 'unknown',
      started_at: Date.now(),
    };
    res.setHeader('x-request-id', requestId);

    if (logRequests) {
      res.on('finish', () => {
        const duration = Date.now() - (req.metadata?.started_at ?? Date.now());
        console.log(`[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms id=${requestId}`);
      });
    }

    next();
  };
}

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';

export type RequestLogger = (...args: unknown[]) => void;

declare global {
  namespace Express {
    interface Request {
      /** Logs prefixed with this request's short id */
      log: RequestLogger;
    }
  }
}

export function callId(req: Request, _: Response, next: NextFunction) {
  const id = uuid().slice(0, 5);

  req.log = (...args: unknown[]) => console.log(`[${id}]`, ...args);

  next();
}

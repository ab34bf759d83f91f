import { reqLog } from 'backend/utils/req-log';
import type { Request, Response, NextFunction } from 'express';

export function getCurrentDate(now = new Date()) {
  const year = now.getFullYear();
  // getMonth() is 0-based
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}`;
}

/**
 * Log each request on arrival, and its status and duration once the
 * response is sent
 */
export default function logTime(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  reqLog(req, `${getCurrentDate()} path: ${req.path}, method: ${req.method}`);

  res.on('finish', () => {
    reqLog(req, `${req.method} ${req.path} ${res.statusCode} in ${Date.now() - started}ms`);
  });

  next();
}

import type { Request, Response } from 'express';

export function handleHealthCheck(_req: Request, res: Response) {
  res.json({
    status: 'healthy',
    timestamp: new Date().toISOString(),
  });
}

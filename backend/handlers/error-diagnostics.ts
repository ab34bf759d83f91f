import type { Request, Response } from 'express';
import { z } from 'zod';
import { ERROR_TYPES, type ErrorLogger } from 'backend/services/error-logging/error-logger';

const diagnosticsQuerySchema = z.object({
  errorType: z.enum(ERROR_TYPES).optional(),
  component: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export function createErrorDiagnosticsHandler(errors: Pick<ErrorLogger, 'recent' | 'stats'>) {
  return function handleErrorDiagnostics(req: Request, res: Response) {
    const parsed = diagnosticsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid query',
        details: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    return res.json({
      stats: errors.stats(),
      recent: errors.recent(parsed.data),
    });
  };
}

import type { Request, Response } from 'express';
import type { LinkRegistry } from 'backend/services/link-registry/link-registry';

export function createRegistryStatsHandler(registry: Pick<LinkRegistry, 'stats' | 'loadError'>) {
  return function handleRegistryStats(_req: Request, res: Response) {
    const loadError = registry.loadError;
    res.json({
      ...registry.stats(),
      ...(loadError ? { loadError } : {}),
    });
  };
}

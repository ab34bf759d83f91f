import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ScrapeResponse } from '@shared/types/scraping';
import type { Settings } from 'backend/config/settings';
import type { ScraperCoordinator } from 'backend/services/scraping/coordinator';
import type { ContentEnricher } from 'backend/services/enrichment/content-enricher';
import { errorLogger, type ErrorLogger } from 'backend/services/error-logging/error-logger';
import { errorMessage } from 'backend/services/error-logging/errors';
import { withDeadline } from 'backend/utils/with-deadline';
import { reqLog } from 'backend/utils/req-log';

export const scrapeBodySchema = z.object({
  keywords: z.string().trim().min(1, 'keywords must not be empty'),
  targetDomain: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  maxPages: z.number().int().min(1).max(10).optional(),
});

export interface ScrapeHandlerDeps {
  coordinator: Pick<ScraperCoordinator, 'run'>;
  enricher: Pick<ContentEnricher, 'enhance'>;
  settings: Pick<Settings, 'maxPages' | 'requestTimeoutMs' | 'enrichmentEnabled'>;
  errors?: ErrorLogger;
}

/**
 * One coordinated run plus enrichment, bounded by the request deadline
 */
async function runScrape(deps: ScrapeHandlerDeps, body: z.infer<typeof scrapeBodySchema>): Promise<ScrapeResponse> {
  const run = await deps.coordinator.run(body.keywords, body.targetDomain, body.maxPages ?? deps.settings.maxPages);
  if (!deps.settings.enrichmentEnabled) {
    return run;
  }

  const results = await deps.enricher.enhance(run.results, body.keywords);
  return {
    results,
    metadata: { ...run.metadata, totalResults: results.length },
  };
}

export function createScrapeHandler(deps: ScrapeHandlerDeps) {
  const errors = deps.errors ?? errorLogger;

  return async function handleScrape(req: Request, res: Response) {
    const parsed = scrapeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({
        error: 'Invalid request body',
        details: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      });
    }

    try {
      reqLog(req, `scrape "${parsed.data.keywords}"${parsed.data.targetDomain ? ` on ${parsed.data.targetDomain}` : ''}`);
      const response = await withDeadline(runScrape(deps, parsed.data), deps.settings.requestTimeoutMs);
      reqLog(req, `scrape returned ${response.results.length} results`);
      return res.json(response);
    } catch (error) {
      errors.logCaught(error, { component: 'scrape-handler', operation: 'scrape' });
      return res.status(500).json({ detail: errorMessage(error) });
    }
  };
}

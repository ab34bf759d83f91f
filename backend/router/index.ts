import { Router } from "express";
import { rateLimit } from "express-rate-limit";
import { rateLimitConfig } from "backend/utils/rate-limit-config";
import { handleHealthCheck } from "backend/handlers/health-check";
import { createScrapeHandler, type ScrapeHandlerDeps } from "backend/handlers/scrape";
import { createRegistryStatsHandler } from "backend/handlers/registry-stats";
import { createErrorDiagnosticsHandler } from "backend/handlers/error-diagnostics";
import { errorLogger } from "backend/services/error-logging/error-logger";
import type { LinkRegistry } from "backend/services/link-registry/link-registry";

export interface RouterDeps extends ScrapeHandlerDeps {
  registry: Pick<LinkRegistry, 'stats' | 'loadError'>;
}

export function createRouter(deps: RouterDeps) {
  const limiter = rateLimit(rateLimitConfig);
  const router = Router();

  // HEALTH CHECKS
  router.get("/health", handleHealthCheck);

  router.post("/scrape", limiter, createScrapeHandler(deps));

  router.get("/registry/stats", createRegistryStatsHandler(deps.registry));

  // DIAGNOSTICS
  router.get("/diagnostics/errors", createErrorDiagnosticsHandler(deps.errors ?? errorLogger));

  return router;
}

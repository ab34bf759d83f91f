import { createServer } from 'http';
import dotenvConfig from './utils/dotenv-config';
import { log, setLogLevel } from './utils/log';
import { errorMessage } from './services/error-logging/errors';
import { loadSettings } from './config/settings';
import { createApp } from './app';
import { BrowserManager } from './services/scraping/core/browser-manager';
import { ScraperCoordinator, buildAdapters } from './services/scraping/coordinator';
import { defaultAdapterFactories } from './services/scraping';
import { createContentEnricher } from './services/enrichment/content-enricher';
import { LinkRegistry } from './services/link-registry/link-registry';

dotenvConfig();

const settings = loadSettings();
setLogLevel(settings.logLevel);
BrowserManager.configure({ executablePath: settings.puppeteerExecutablePath });

const coordinator = new ScraperCoordinator(buildAdapters(settings, defaultAdapterFactories));
const enricher = createContentEnricher(settings);
const registry = new LinkRegistry({ registryFile: settings.linkRegistryFile });

const app = createApp({ coordinator, enricher, registry, settings });
const httpServer = createServer(app);

httpServer.listen(settings.port, () => {
  log(`Server is running on port ${settings.port} with sources: ${coordinator.sourceNames.join(', ') || 'none'}`, 'server');
});

function shutdown(signal: string) {
  log(`${signal} received, shutting down`, 'server');
  httpServer.close();
  BrowserManager.shutdown().then(
    () => {
      process.exitCode = 0;
    },
    (error: unknown) => {
      log(`Browser shutdown failed: ${errorMessage(error)}`, 'server', 'error');
      process.exitCode = 1;
    },
  );
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

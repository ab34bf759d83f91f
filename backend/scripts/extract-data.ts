import dotenvConfig from 'backend/utils/dotenv-config';
import { loadSettings } from 'backend/config/settings';
import { log, setLogLevel } from 'backend/utils/log';
import { errorMessage } from 'backend/services/error-logging/errors';
import { LinkRegistry } from 'backend/services/link-registry/link-registry';
import { FirecrawlClient } from 'backend/services/scraping/clients/firecrawl-client';
import { ArtifactWriter } from 'backend/services/batch-extraction/artifact-writer';
import { DomainExtractor } from 'backend/services/batch-extraction/domain-extractor';
import { USAGE, parseExtractArgs, type ExtractArgs } from './cli-args';

async function main(): Promise<number> {
  let args: ExtractArgs;
  try {
    args = parseExtractArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 2;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  dotenvConfig();
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  const registry = new LinkRegistry({ registryFile: settings.linkRegistryFile });
  if (args.resetRegistry) {
    registry.clear();
  }
  const before = registry.stats();
  log(`Registry holds ${before.totalLinks} links`, 'batch-extract');

  const extractor = new DomainExtractor({
    client: new FirecrawlClient({ apiKey: settings.firecrawlApiKey ?? '', apiUrl: settings.firecrawlApiUrl }),
    registry,
    writer: new ArtifactWriter({ outputDir: settings.outputDir }),
  });

  const result = await extractor.extractAll(args.keyword, args.domain, args.pages);

  log(`References found: ${result.stats.totalReferences}`, 'batch-extract');
  log(`Videos found: ${result.stats.totalVideos}`, 'batch-extract');
  log(`Links found: ${result.stats.totalLinks}`, 'batch-extract');
  log(`Total results: ${result.stats.totalResults}`, 'batch-extract');
  log(`Registry now holds ${registry.stats().totalLinks} links`, 'batch-extract');
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log(`Extraction failed: ${errorMessage(error)}`, 'batch-extract', 'error');
    process.exitCode = 1;
  });

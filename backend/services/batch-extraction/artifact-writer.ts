import fs from 'fs';
import path from 'path';
import { log } from 'backend/utils/log';

/** Replace every character that is not a letter or digit with `_` */
export function slugify(text: string): string {
  return text.replace(/[^\p{L}\p{N}]/gu, '_');
}

/** Host part of a domain or URL, slugified */
export function hostSlug(website: string): string {
  return slugify(website.replace(/^https?:\/\//i, '').split('/')[0]);
}

/** Local time as YYYYMMDD_HHMMSS */
export function fileTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface ArtifactWriterOptions {
  outputDir: string;
  now?: () => Date;
}

/**
 * Writes timestamped JSON artifacts for batch extraction runs
 */
export class ArtifactWriter {
  readonly outputDir: string;
  private readonly now: () => Date;

  constructor(options: ArtifactWriterOptions) {
    this.outputDir = options.outputDir;
    this.now = options.now ?? (() => new Date());
  }

  /** `<category>_<query>_<host>_<stamp>.json` */
  writeCategory(category: string, query: string, website: string, payload: unknown): string {
    const filename = `${category}_${slugify(query)}_${hostSlug(website)}_${fileTimestamp(this.now())}.json`;
    return this.write(filename, payload);
  }

  /** `combined_<query>_<domain>_<stamp>.json` */
  writeCombined(query: string, domain: string, payload: unknown): string {
    const filename = `combined_${slugify(query)}_${slugify(domain)}_${fileTimestamp(this.now())}.json`;
    return this.write(filename, payload);
  }

  private write(filename: string, payload: unknown): string {
    fs.mkdirSync(this.outputDir, { recursive: true });
    const filepath = path.join(this.outputDir, filename);
    fs.writeFileSync(filepath, JSON.stringify(payload, null, 2), 'utf-8');
    log(`[Artifacts] Output saved to ${filepath}`, 'batch-extract');
    return filepath;
  }
}

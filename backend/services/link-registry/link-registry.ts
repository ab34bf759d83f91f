import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { log } from 'backend/utils/log';
import { errorLogger, type ErrorLogger } from 'backend/services/error-logging/error-logger';
import { errorMessage } from 'backend/services/error-logging/errors';

const registryEntrySchema = z.object({
  registeredBy: z.string(),
  timestamp: z.string(),
});

const registryDocumentSchema = z.object({
  links: z.record(registryEntrySchema),
  metadata: z.object({
    createdAt: z.string(),
    lastUpdatedAt: z.string(),
    loadError: z.string().optional(),
  }),
});

export type RegistryEntry = z.infer<typeof registryEntrySchema>;
export type RegistryDocument = z.infer<typeof registryDocumentSchema>;

export interface RegistryStats {
  totalLinks: number;
  countsByRegistrant: Record<string, number>;
  createdAt: string;
  lastUpdatedAt: string;
}

export interface LinkRegistryOptions {
  registryFile?: string;
  now?: () => Date;
  errors?: ErrorLogger;
}

export const DEFAULT_REGISTRY_FILE = path.join('outputs', 'link_registry.json');

/**
 * Durable record of every link handed out, and by whom. Every mutation
 * re-reads the file, applies the change on top of what is there and flushes
 * it to disk before the call returns, so registries sharing a file keep each
 * other's links. Writers are not locked against each other: two writes that
 * interleave between read and rename can still lose the earlier one.
 */
export class LinkRegistry {
  readonly registryFile: string;
  private readonly now: () => Date;
  private readonly errors: ErrorLogger;
  private document: RegistryDocument;

  constructor(options: LinkRegistryOptions = {}) {
    this.registryFile = options.registryFile ?? DEFAULT_REGISTRY_FILE;
    this.now = options.now ?? (() => new Date());
    this.errors = options.errors ?? errorLogger;
    this.document = this.load();
  }

  /**
   * URLs that are unknown, or that were first registered by `registrant`
   */
  filterNew(urls: readonly string[], registrant?: string): string[] {
    this.refresh();
    return urls.filter((url) => {
      if (!url) return false;
      const entry = this.entryFor(url);
      return entry === undefined || (registrant !== undefined && entry.registeredBy === registrant);
    });
  }

  /**
   * Record the URLs not seen before; returns how many were new
   */
  register(urls: readonly string[], registrant: string): number {
    if (urls.length === 0) return 0;

    this.refresh();
    const timestamp = this.now().toISOString();
    let added = 0;
    for (const url of urls) {
      if (!url || this.entryFor(url) !== undefined) continue;
      this.document.links[url] = { registeredBy: registrant, timestamp };
      added++;
    }

    this.save();
    log(`[LinkRegistry] Registered ${added} new links for ${registrant}`, 'link-registry');
    return added;
  }

  stats(): RegistryStats {
    this.refresh();
    const countsByRegistrant: Record<string, number> = {};
    for (const entry of Object.values(this.document.links)) {
      countsByRegistrant[entry.registeredBy] = (countsByRegistrant[entry.registeredBy] ?? 0) + 1;
    }
    return {
      totalLinks: Object.keys(this.document.links).length,
      countsByRegistrant,
      createdAt: this.document.metadata.createdAt,
      lastUpdatedAt: this.document.metadata.lastUpdatedAt,
    };
  }

  private entryFor(url: string): RegistryEntry | undefined {
    return Object.hasOwn(this.document.links, url) ? this.document.links[url] : undefined;
  }

  get loadError(): string | undefined {
    return this.document.metadata.loadError;
  }

  clear(): void {
    this.document = this.emptyDocument();
    this.save();
    log(`[LinkRegistry] Registry cleared`, 'link-registry');
  }

  private emptyDocument(loadError?: string): RegistryDocument {
    const timestamp = this.now().toISOString();
    return {
      links: {},
      metadata: { createdAt: timestamp, lastUpdatedAt: timestamp, ...(loadError ? { loadError } : {}) },
    };
  }

  private readFile(): RegistryDocument {
    const raw: unknown = JSON.parse(fs.readFileSync(this.registryFile, 'utf-8'));
    return registryDocumentSchema.parse(raw);
  }

  private load(): RegistryDocument {
    if (!fs.existsSync(this.registryFile)) {
      return this.emptyDocument();
    }

    try {
      const document = this.readFile();
      log(`[LinkRegistry] Loaded ${Object.keys(document.links).length} links from ${this.registryFile}`, 'link-registry');
      return document;
    } catch (error) {
      const reason = errorMessage(error);
      this.errors.logStorageError(`Could not load registry, starting empty: ${reason}`, {
        component: 'link-registry',
        operation: 'load',
        url: this.registryFile,
      });
      return this.emptyDocument(reason);
    }
  }

  /**
   * Pick up links other owners of the file wrote since the last read. An
   * unreadable or missing file leaves the in-memory copy in place.
   */
  private refresh(): void {
    if (!fs.existsSync(this.registryFile)) return;

    try {
      this.document = this.readFile();
    } catch (error) {
      log(
        `[LinkRegistry] Could not re-read ${this.registryFile}, keeping the in-memory copy: ${errorMessage(error)}`,
        'link-registry',
        'warn',
      );
    }
  }

  /**
   * Write through a temp file and rename so readers never see a partial document
   */
  private save(): void {
    this.document.metadata.lastUpdatedAt = this.now().toISOString();
    const tempFile = `${this.registryFile}.${process.pid}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.registryFile), { recursive: true });
      fs.writeFileSync(tempFile, JSON.stringify(this.document, null, 2), 'utf-8');
      fs.renameSync(tempFile, this.registryFile);
    } catch (error) {
      fs.rmSync(tempFile, { force: true });
      this.errors.logStorageError(`Could not save registry: ${errorMessage(error)}`, {
        component: 'link-registry',
        operation: 'save',
        url: this.registryFile,
      });
    }
  }
}

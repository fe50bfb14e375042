import { createHash } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import type { CatalogCandidate } from './catalog.js';
import { describeError } from './errors.js';
import type { Logger } from './logging.js';

export interface ResultCache {
  get(query: string): Promise<CatalogCandidate[] | undefined>;
  put(query: string, candidates: CatalogCandidate[]): Promise<void>;
  clear(): Promise<void>;
}

export interface ResultCacheOptions {
  /** Entries beyond this count evict the least recently used one. */
  maxEntries?: number;
  /** Entries older than this are treated as a miss and dropped. */
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

type CacheEntry = {
  query: string;
  storedAt: number;
  candidates: CatalogCandidate[];
};

const DEFAULT_MAX_ENTRIES = 1000;
const DEFAULT_TTL_MS = 30 * 24 * 60 * 60 * 1000;
const CACHE_FORMAT_VERSION = 1;

const candidateSchema = z.object({
  fdcId: z.number().int().positive(),
  description: z.string(),
  brandOwner: z.string().optional(),
  category: z.string().optional(),
  dataType: z.string().optional(),
  raw: z.record(z.string(), z.unknown())
});

const cacheDocumentSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  entries: z.array(
    z.object({
      key: z.string(),
      query: z.string(),
      storedAt: z.number(),
      candidates: z.array(candidateSchema)
    })
  )
});

export function cacheKey(query: string): string {
  return createHash('sha256').update(query, 'utf8').digest('hex');
}

/**
 * In-memory store shared by both cache flavours. Map insertion order doubles as
 * recency order: hits are re-inserted at the end, eviction takes from the front.
 */
class EntryStore {
  readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options?: ResultCacheOptions) {
    this.maxEntries = Math.max(1, options?.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.ttlMs = options?.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options?.now ?? Date.now;
  }

  /** Returns the candidates and whether the store changed (expiry or reorder). */
  lookup(query: string): { candidates?: CatalogCandidate[]; changed: boolean } {
    const key = cacheKey(query);
    const entry = this.entries.get(key);
    if (!entry || entry.query !== query) {
      return { changed: false };
    }

    if (this.now() - entry.storedAt > this.ttlMs) {
      this.entries.delete(key);
      return { changed: true };
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return { candidates: entry.candidates.map(cloneCandidate), changed: true };
  }

  store(query: string, candidates: CatalogCandidate[]): void {
    const key = cacheKey(query);
    this.entries.delete(key);
    this.entries.set(key, { query, storedAt: this.now(), candidates: candidates.map(cloneCandidate) });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}

export class MemoryResultCache implements ResultCache {
  private readonly store: EntryStore;

  constructor(options?: ResultCacheOptions) {
    this.store = new EntryStore(options);
  }

  async get(query: string): Promise<CatalogCandidate[] | undefined> {
    return this.store.lookup(query).candidates;
  }

  async put(query: string, candidates: CatalogCandidate[]): Promise<void> {
    this.store.store(query, candidates);
  }

  async clear(): Promise<void> {
    this.store.entries.clear();
  }

  get size(): number {
    return this.store.entries.size;
  }
}

/**
 * Search results persisted as one JSON document. Entries are addressed by the
 * SHA-256 of the exact query text. All writes go through one queue and replace
 * the file atomically.
 */
export class FileResultCache implements ResultCache {
  private readonly store: EntryStore;
  private readonly filePath: string;
  private readonly logger?: Logger;
  private loading?: Promise<void>;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string, options?: ResultCacheOptions) {
    this.filePath = filePath;
    this.store = new EntryStore(options);
    this.logger = options?.logger;
  }

  /**
   * Expiry and the recency reorder of a hit are written back, so LRU order
   * survives a restart. A failed write-back is logged; the lookup still answers.
   */
  async get(query: string): Promise<CatalogCandidate[] | undefined> {
    await this.ensureLoaded();
    const { candidates, changed } = this.store.lookup(query);
    if (changed) {
      try {
        await this.persist();
      } catch (error) {
        this.logger?.(`Could not update result cache at ${this.filePath}: ${describeError(error)}`);
      }
    }
    return candidates;
  }

  async put(query: string, candidates: CatalogCandidate[]): Promise<void> {
    await this.ensureLoaded();
    this.store.store(query, candidates);
    await this.persist();
  }

  async clear(): Promise<void> {
    await this.ensureLoaded();
    this.store.entries.clear();
    await this.persist();
  }

  get size(): number {
    return this.store.entries.size;
  }

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger?.(`Could not read result cache at ${this.filePath}; starting empty. ${describeError(error)}`);
      }
      return;
    }

    let document: z.infer<typeof cacheDocumentSchema>;
    try {
      document = cacheDocumentSchema.parse(JSON.parse(text));
    } catch (error) {
      this.logger?.(`Ignoring unreadable result cache at ${this.filePath}; it will be rewritten. ${describeError(error)}`);
      return;
    }

    for (const entry of document.entries) {
      if (entry.key !== cacheKey(entry.query)) {
        continue;
      }
      this.store.entries.set(entry.key, {
        query: entry.query,
        storedAt: entry.storedAt,
        candidates: entry.candidates
      });
    }
  }

  private persist(): Promise<void> {
    const write = this.writeQueue.then(() => this.writeSnapshot());
    // Keep the queue alive after a failed write; the caller still sees the error.
    this.writeQueue = write.catch(() => undefined);
    return write;
  }

  private async writeSnapshot(): Promise<void> {
    const document = {
      version: CACHE_FORMAT_VERSION,
      entries: Array.from(this.store.entries, ([key, entry]) => ({ key, ...entry }))
    };
    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    await mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await writeFile(tempPath, JSON.stringify(document), 'utf8');
      await rename(tempPath, this.filePath);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}

function cloneCandidate(candidate: CatalogCandidate): CatalogCandidate {
  return { ...candidate, raw: { ...candidate.raw } };
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Position Cache
 *
 * Remembers render parameters that produced a passing certificate for a given
 * set of field texts. A hit is advisory: the verifier always re-renders and
 * re-verifies before trusting it.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import NodeCache from 'node-cache';
import { createLogger } from '../utils/logger';
import { CacheSnapshotEntry, CacheSnapshotSchema, formatZodError } from './schemas';
import { CacheEntry, DEFAULT_CACHE_TTL_SECONDS, FieldValues, RenderParameters } from './types';

const logger = createLogger('position-cache');

export interface PositionCacheOptions {
  ttlSeconds: number;
  checkPeriodSeconds: number;
}

export interface PositionCacheStats {
  size: number;
  hits: number;
  misses: number;
}

export function canonicalizeFieldText(value: string): string {
  return value.normalize('NFC').trim().toLowerCase();
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class PositionCache {
  private readonly store: NodeCache;
  private readonly ttlSeconds: number;
  private hits = 0;
  private misses = 0;

  constructor(options: Partial<PositionCacheOptions> = {}) {
    const ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
    if (!(ttlSeconds > 0)) {
      throw new RangeError(`ttlSeconds must be positive, got ${ttlSeconds}`);
    }
    this.ttlSeconds = ttlSeconds;

    this.store = new NodeCache({
      stdTTL: ttlSeconds,
      checkperiod: options.checkPeriodSeconds ?? 600,
      useClones: true,
    });
  }

  /**
   * Stable key over the canonicalized text of the given fields, independent
   * of the order they were supplied in. The verifier passes only the
   * required fields, so optional text never splits an entry.
   */
  static keyFor(fields: Readonly<FieldValues>): string {
    const canonical = Object.keys(fields)
      .sort()
      .map((name) => [name, canonicalizeFieldText(fields[name])]);
    return createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
  }

  get(fields: Readonly<FieldValues>): RenderParameters | undefined {
    return this.lookup(fields)?.payload;
  }

  // Like get, but returns the whole entry so a caller can later tell whether it was replaced
  lookup(fields: Readonly<FieldValues>): CacheEntry | undefined {
    const key = PositionCache.keyFor(fields);
    const entry = this.store.get<CacheEntry>(key);

    if (!entry) {
      this.misses++;
      logger.debug({ key: key.slice(0, 8) }, 'Position cache miss');
      return undefined;
    }

    this.hits++;
    logger.debug({ key: key.slice(0, 8), ageMs: Date.now() - entry.createdAt }, 'Position cache hit');
    return entry;
  }

  set(fields: Readonly<FieldValues>, payload: RenderParameters, ttlSeconds: number = this.ttlSeconds): void {
    if (!(ttlSeconds > 0)) {
      throw new RangeError(`ttlSeconds must be positive, got ${ttlSeconds}`);
    }

    const key = PositionCache.keyFor(fields);
    const entry: CacheEntry = { key, payload, createdAt: Date.now(), ttlSeconds };
    this.store.set(key, entry, ttlSeconds);
    logger.debug({ key: key.slice(0, 8), ttlSeconds }, 'Cached render parameters');
  }

  invalidate(fields: Readonly<FieldValues>): boolean {
    const key = PositionCache.keyFor(fields);
    const removed = this.store.del(key) > 0;
    if (removed) {
      logger.info({ key: key.slice(0, 8) }, 'Discarded position cache entry');
    }
    return removed;
  }

  /**
   * Remove the entry only while it is still the one the caller read. An entry
   * written in the meantime by another run is kept.
   */
  invalidateIf(fields: Readonly<FieldValues>, expected: Pick<CacheEntry, 'createdAt' | 'payload'>): boolean {
    const key = PositionCache.keyFor(fields);
    const current = this.store.get<CacheEntry>(key);
    if (!current) {
      return false;
    }
    if (
      current.createdAt !== expected.createdAt ||
      JSON.stringify(current.payload) !== JSON.stringify(expected.payload)
    ) {
      logger.debug({ key: key.slice(0, 8) }, 'Position cache entry was replaced; keeping it');
      return false;
    }
    return this.invalidate(fields);
  }

  /**
   * Remove every expired entry now instead of waiting for the next lookup or
   * check period. Returns how many entries were dropped.
   */
  clearExpired(): number {
    let removed = 0;
    for (const key of this.store.keys()) {
      // getTtl drops an expired key as a side effect
      if (this.store.getTtl(key) === undefined) {
        removed++;
      }
    }
    if (removed > 0) {
      logger.info({ removed }, 'Cleared expired position cache entries');
    }
    return removed;
  }

  clearAll(): void {
    this.store.flushAll();
    this.hits = 0;
    this.misses = 0;
    logger.info('Cleared all position cache entries');
  }

  stats(): PositionCacheStats {
    return {
      size: this.store.keys().length,
      hits: this.hits,
      misses: this.misses,
    };
  }

  snapshot(): CacheSnapshotEntry[] {
    const entries: CacheSnapshotEntry[] = [];
    for (const key of this.store.keys()) {
      const expiresAt = this.store.getTtl(key);
      // Direct store reads leave the hit/miss counters untouched
      const entry = expiresAt === undefined ? undefined : this.store.get<CacheEntry>(key);
      if (entry && expiresAt !== undefined) {
        entries.push({ ...entry, expiresAt });
      }
    }
    return entries;
  }

  /**
   * Load entries taken by `snapshot`, keeping their original expiry. Entries
   * that have already expired are skipped.
   */
  restore(entries: readonly CacheSnapshotEntry[]): number {
    const now = Date.now();
    let restored = 0;
    for (const entry of entries) {
      const remainingSeconds = (entry.expiresAt - now) / 1000;
      if (remainingSeconds <= 0) {
        continue;
      }
      const cached: CacheEntry = {
        key: entry.key,
        payload: entry.payload,
        createdAt: entry.createdAt,
        ttlSeconds: entry.ttlSeconds,
      };
      this.store.set(entry.key, cached, remainingSeconds);
      restored++;
    }
    return restored;
  }

  async saveToFile(filePath: string): Promise<number> {
    const entries = this.snapshot();
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      JSON.stringify({ version: 1, savedAt: new Date().toISOString(), entries }, null, 2),
      'utf8'
    );
    logger.debug({ filePath, entries: entries.length }, 'Saved position cache');
    return entries.length;
  }

  async loadFromFile(filePath: string): Promise<number> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ filePath, err: error }, 'Position cache file is not valid JSON; starting empty');
      return 0;
    }

    const parsed = CacheSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ filePath, issues: formatZodError(parsed.error) }, 'Position cache file failed validation; starting empty');
      return 0;
    }

    const restored = this.restore(parsed.data.entries);
    logger.info({ filePath, restored }, 'Loaded position cache');
    return restored;
  }

  close(): void {
    this.store.close();
  }
}

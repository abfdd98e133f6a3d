/**
 * Content-Addressed Image Cache
 *
 * Maps an exact prompt string to a previously generated image:
 * - key is the first 128 bits of SHA-256(prompt), hex encoded
 * - entries are canonical PNG files named `<key>.png`
 * - writes are atomic, so a crash mid-fetch never leaves a readable partial entry
 * - a failed write is logged; the fetched image is still returned
 * - an entry that no longer decodes is evicted and refetched
 *
 * Storage sits behind `CacheStore` so tests and `--no-cache` runs use memory.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import { join } from 'path';
import { writeFileAtomic } from './atomic-writer.js';
import { CacheCorruptionError } from './errors.js';
import type { Logger } from './logger.js';
import { errorMessage, silentLogger } from './logger.js';
import type { RenderedImage } from '../m3-illustrate/src/types.js';
import { decodeImage } from '../m3-illustrate/src/raster.js';

export const CACHE_KEY_HEX_LENGTH = 32;

export interface CacheStore {
  read(key: string): Promise<Buffer | undefined>;
  write(key: string, data: Buffer): Promise<void>;
  remove(key: string): Promise<void>;
}

export interface CacheMetrics {
  hits_total: number;
  misses_total: number;
  writes_total: number;
  evictions_total: number;
  hit_rate: number;
}

export type ImageDecoder = (bytes: Uint8Array, source: RenderedImage['source']) => Promise<RenderedImage>;

export type ImageFetcher = (prompt: string) => Promise<Uint8Array>;

export function cacheKeyForPrompt(prompt: string): string {
  return createHash('sha256').update(prompt, 'utf8').digest('hex').substring(0, CACHE_KEY_HEX_LENGTH);
}

/**
 * Disk store: one `<key>.png` per entry in a flat directory.
 */
export class DiskCacheStore implements CacheStore {
  constructor(private directory: string) {}

  async read(key: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(this.pathFor(key));
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
  }

  async write(key: string, data: Buffer): Promise<void> {
    await writeFileAtomic(this.pathFor(key), data);
  }

  async remove(key: string): Promise<void> {
    await fs.rm(this.pathFor(key), { force: true });
  }

  pathFor(key: string): string {
    return join(this.directory, `${key}.png`);
  }
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, Buffer>();

  async read(key: string): Promise<Buffer | undefined> {
    return this.entries.get(key);
  }

  async write(key: string, data: Buffer): Promise<void> {
    this.entries.set(key, Buffer.from(data));
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

export class ImageCache {
  private metrics: Omit<CacheMetrics, 'hit_rate'> = {
    hits_total: 0,
    misses_total: 0,
    writes_total: 0,
    evictions_total: 0
  };

  constructor(
    private store: CacheStore,
    private logger: Logger = silentLogger,
    private decode: ImageDecoder = decodeImage
  ) {}

  /**
   * Return the cached image for `prompt`, or call `fetch` once, persist the
   * canonical PNG and return it.
   */
  async get(prompt: string, fetch: ImageFetcher): Promise<RenderedImage> {
    const key = cacheKeyForPrompt(prompt);

    const cached = await this.readEntry(key);
    if (cached) {
      this.metrics.hits_total++;
      this.logger('debug', 'Image served from cache', { key });
      return cached;
    }

    this.metrics.misses_total++;
    const fetched = await fetch(prompt);
    const image = await this.decode(fetched, 'provider');

    try {
      await this.store.write(key, image.data);
      this.metrics.writes_total++;
      this.logger('debug', 'Image cached', { key, bytes: image.data.byteLength });
    } catch (error) {
      this.logger('warn', 'Image not cached; store write failed', { key, error: errorMessage(error) });
    }

    return image;
  }

  getMetrics(): CacheMetrics {
    const lookups = this.metrics.hits_total + this.metrics.misses_total;
    return {
      ...this.metrics,
      hit_rate: lookups > 0 ? this.metrics.hits_total / lookups : 0
    };
  }

  private async readEntry(key: string): Promise<RenderedImage | undefined> {
    const bytes = await this.store.read(key);
    if (!bytes) return undefined;

    try {
      return await this.decode(bytes, 'cache');
    } catch (cause) {
      const corruption = new CacheCorruptionError(key, cause);
      this.logger('warn', 'Evicting unreadable cache entry', { key, error: errorMessage(corruption.cause) });
      await this.store.remove(key);
      this.metrics.evictions_total++;
      return undefined;
    }
  }
}

// fs errors may come from another realm, so no instanceof check
function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

import { createHash } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ScoutError, errorMessage, hasErrorCode } from '../errors.js';
import { RepositoryCloner } from '../source/git-cloner.js';
import { redactUrl } from '../source/github-url.js';
import { CacheEntryInfo, CacheInfo } from '../types/index.js';
import { Logger } from '../utils/logger.js';

const BYTES_PER_MB = 1024 * 1024;
const MS_PER_HOUR = 60 * 60 * 1000;
const CACHE_KEY = /^[a-f0-9]{32}$/;

export interface RepositoryCacheOptions {
  dir: string;
  maxAgeHours: number;
  maxSizeMb: number;
  cloner: RepositoryCloner;
  logger?: Logger;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface CacheResolveOptions {
  ref?: string;
  token?: string;
  shallow?: boolean;
}

interface CacheEntry {
  key: string;
  path: string;
  mtimeMs: number;
  sizeBytes: number;
}

/**
 * Keeps clones of remote repositories on disk, one directory per
 * (url, ref) key. The directory's mtime is the only freshness signal.
 *
 * Every operation runs behind one cache-wide lock, so two resolutions of the
 * same key never clone twice and eviction never races a clone.
 */
export class RepositoryCache {
  readonly dir: string;
  private readonly maxAgeMs: number;
  private readonly maxSizeBytes: number;
  private readonly cloner: RepositoryCloner;
  private readonly logger: Logger;
  private readonly now: () => number;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: RepositoryCacheOptions) {
    this.dir = options.dir;
    this.maxAgeMs = options.maxAgeHours * MS_PER_HOUR;
    this.maxSizeBytes = options.maxSizeMb * BYTES_PER_MB;
    this.cloner = options.cloner;
    this.logger = options.logger ?? new Logger({ scope: 'cache' });
    this.now = options.now ?? Date.now;
  }

  static keyFor(url: string, ref?: string): string {
    return createHash('md5')
      .update(`${url}:${ref ?? 'default'}`)
      .digest('hex');
  }

  static isValidKey(key: string): boolean {
    return CACHE_KEY.test(key);
  }

  pathFor(key: string): string {
    return path.join(this.dir, key);
  }

  async resolve(url: string, options: CacheResolveOptions = {}): Promise<string> {
    const key = RepositoryCache.keyFor(url, options.ref);
    const entryPath = this.pathFor(key);

    return this.withLock(async () => {
      await fs.mkdir(this.dir, { recursive: true });

      const stats = await statOrNull(entryPath);
      if (stats && this.now() - stats.mtimeMs < this.maxAgeMs) {
        this.logger.debug('Using cached repository', { key });
        return entryPath;
      }

      if (stats) {
        this.logger.info('Cached repository expired, re-cloning', { key });
        await fs.rm(entryPath, { recursive: true, force: true });
      }

      this.logger.info('Cloning repository to cache', { url: redactUrl(url), key });

      try {
        await this.cloner.clone({
          url,
          destination: entryPath,
          ref: options.ref,
          token: options.token,
          shallow: options.shallow ?? true,
        });
      } catch (error) {
        await this.removeQuietly(entryPath);
        throw error;
      }

      await this.evict(key);
      return entryPath;
    });
  }

  /**
   * Remove one entry, or wipe and recreate the whole cache root
   */
  async invalidate(key?: string): Promise<void> {
    return this.withLock(async () => {
      if (key) {
        if (!RepositoryCache.isValidKey(key)) {
          throw new ScoutError(`Invalid cache key '${key}'`, 'Use a key listed by the cache info command.');
        }
        await fs.rm(this.pathFor(key), { recursive: true, force: true });
        this.logger.info('Removed cache entry', { key });
        return;
      }

      await fs.rm(this.dir, { recursive: true, force: true });
      await fs.mkdir(this.dir, { recursive: true });
      this.logger.info('Cleared repository cache', { dir: this.dir });
    });
  }

  async getInfo(): Promise<CacheInfo> {
    return this.withLock(async () => {
      const entries = await this.listEntries();
      const totalBytes = entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);

      const repos: CacheEntryInfo[] = entries
        .sort((a, b) => b.mtimeMs - a.mtimeMs)
        .map((entry) => ({
          key: entry.key,
          sizeMb: roundMb(entry.sizeBytes),
          mtime: new Date(entry.mtimeMs).toISOString(),
        }));

      return {
        cacheDir: this.dir,
        totalRepos: repos.length,
        totalSizeMb: roundMb(totalBytes),
        maxSizeMb: this.options.maxSizeMb,
        repos,
      };
    });
  }

  /**
   * Delete oldest entries until the total is at or under the ceiling. The
   * entry that was just resolved is never a candidate.
   */
  private async evict(keep: string): Promise<void> {
    const entries = await this.listEntries();
    let total = entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);
    const candidates = entries.filter((entry) => entry.key !== keep).sort((a, b) => a.mtimeMs - b.mtimeMs);

    while (total > this.maxSizeBytes && candidates.length > 0) {
      const oldest = candidates.shift();
      if (!oldest) {
        break;
      }

      try {
        await fs.rm(oldest.path, { recursive: true, force: true });
        total -= oldest.sizeBytes;
        this.logger.info('Evicted cache entry', { key: oldest.key, sizeMb: roundMb(oldest.sizeBytes) });
      } catch (error) {
        this.logger.warn('Failed to evict cache entry', { key: oldest.key, error: errorMessage(error) });
      }
    }

    if (total > this.maxSizeBytes) {
      this.logger.warn('Cache still exceeds its size ceiling', {
        totalMb: roundMb(total),
        maxSizeMb: this.options.maxSizeMb,
      });
    }
  }

  private async listEntries(): Promise<CacheEntry[]> {
    let dirents;
    try {
      dirents = await fs.readdir(this.dir, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const entries: CacheEntry[] = [];
    for (const dirent of dirents) {
      if (!dirent.isDirectory()) {
        continue;
      }

      const entryPath = this.pathFor(dirent.name);
      const stats = await fs.stat(entryPath);
      entries.push({
        key: dirent.name,
        path: entryPath,
        mtimeMs: stats.mtimeMs,
        sizeBytes: await directorySize(entryPath),
      });
    }
    return entries;
  }

  private async removeQuietly(target: string): Promise<void> {
    try {
      await fs.rm(target, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn('Failed to remove partial clone', { path: target, error: errorMessage(error) });
    }
  }

  private withLock<T>(work: () => Promise<T>): Promise<T> {
    const run = this.queue.then(work);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

/**
 * Sum of regular file sizes below `dir`; symlinks are not followed
 */
export async function directorySize(dir: string): Promise<number> {
  let total = 0;
  const dirents = await fs.readdir(dir, { withFileTypes: true });

  for (const dirent of dirents) {
    const fullPath = path.join(dir, dirent.name);
    if (dirent.isDirectory()) {
      total += await directorySize(fullPath);
    } else if (dirent.isFile()) {
      const stats = await fs.lstat(fullPath);
      total += stats.size;
    }
  }

  return total;
}

async function statOrNull(target: string): Promise<{ mtimeMs: number } | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return hasErrorCode(error, 'ENOENT');
}

function roundMb(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}

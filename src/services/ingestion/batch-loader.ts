/**
 * Batch Loader
 * Memoizes file reads so an unchanged export is parsed once
 */

import { statSync } from 'fs';
import { resolve } from 'path';
import { createServiceLogger } from '../../shared/logger';
import { TabularBatch } from '../../shared/types';
import { TabularFileReader } from './file-reader';
import { BatchLoaderStats, CachedBatch, FileIdentity, ReadOptions } from './interfaces';

const logger = createServiceLogger('ingestion');

export class BatchLoader {
  private cache = new Map<string, CachedBatch>();
  private hits = 0;
  private misses = 0;

  /**
   * Cached batch when path, size and mtime all match; otherwise a fresh read
   */
  load(filePath: string, options: ReadOptions = {}): TabularBatch {
    const identity = BatchLoader.identify(filePath);
    const cacheKey = `${identity.path}\u0000${options.name ?? ''}`;
    const cached = this.cache.get(cacheKey);

    if (cached && BatchLoader.sameFile(cached.identity, identity)) {
      this.hits++;
      logger.debug(`Batch cache hit for ${identity.path}`);
      return cached.batch;
    }

    this.misses++;
    const batch = TabularFileReader.read(identity.path, options);
    this.cache.set(cacheKey, { identity, batch });
    return batch;
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): BatchLoaderStats {
    return { hits: this.hits, misses: this.misses, cached: this.cache.size };
  }

  static identify(filePath: string): FileIdentity {
    const path = resolve(filePath);
    const stats = statSync(path);
    return { path, size: stats.size, mtimeMs: stats.mtimeMs };
  }

  private static sameFile(a: FileIdentity, b: FileIdentity): boolean {
    return a.path === b.path && a.size === b.size && a.mtimeMs === b.mtimeMs;
  }
}

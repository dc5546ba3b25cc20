/**
 * Ingestion Interfaces and Types
 */

import { TabularBatch } from '../../shared/types';

export type SourceFormat = 'csv' | 'xlsx';

export interface ReadOptions {
  // Batch name; defaults to the file's base name
  name?: string;
}

export interface FileIdentity {
  path: string;
  size: number;
  mtimeMs: number;
}

export interface CachedBatch {
  identity: FileIdentity;
  batch: TabularBatch;
}

export interface BatchLoaderStats {
  hits: number;
  misses: number;
  cached: number;
}

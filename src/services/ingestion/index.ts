/**
 * Ingestion Module
 * CSV and spreadsheet loading into tabular batches
 */

export { TabularFileReader } from './file-reader';
export { BatchLoader } from './batch-loader';
export * from './interfaces';

/**
 * Record Normalizer Module
 */

export { RecordNormalizer } from './normalizer';
export * from './interfaces';

/**
 * Claim Deduplicator Module
 */

export { ClaimDeduplicator } from './deduplicator';
export * from './interfaces';

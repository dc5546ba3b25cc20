/**
 * Remittance (ERA) Module
 */

export { RemittanceNormalizer, REMITTANCE_SOURCE_COLUMNS } from './normalizer';
export * from './interfaces';

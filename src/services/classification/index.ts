/**
 * Classification Engine Module
 */

export { TimeBucketer } from './time-buckets';
export { AgingClassifier } from './aging-buckets';
export { ExclusionFilters, KPI_FILTER_POLICY } from './exclusion-filters';
export * from './interfaces';

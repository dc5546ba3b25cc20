/**
 * Aggregation Module
 */

export { Aggregator } from './aggregator';
export {
  MinorCategoryFolder,
  DEFAULT_MINOR_AMOUNT_FLOOR,
  DEFAULT_MINOR_AMOUNT_QUANTILE,
  DEFAULT_MINOR_COUNT_THRESHOLD,
} from './folding';
export * from './interfaces';

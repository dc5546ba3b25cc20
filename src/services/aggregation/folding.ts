/**
 * Minor-Category Folder
 * Folds low-volume categories into a single "Other minor payers" row
 */

import { createServiceLogger } from '../../shared/logger';
import { OTHER_MINOR_PAYERS } from '../../shared/types';
import { calculatePercentage, quantile, sum } from '../../shared/utils';
import { CategoryShare, CategoryValue } from './interfaces';

const logger = createServiceLogger('aggregation');

export const DEFAULT_MINOR_COUNT_THRESHOLD = 10;
export const DEFAULT_MINOR_AMOUNT_QUANTILE = 0.1;
export const DEFAULT_MINOR_AMOUNT_FLOOR = 1.0;

export class MinorCategoryFolder {
  /**
   * Fold categories whose count is strictly below the threshold, then add
   * each remaining row's share of the total (2 decimals)
   */
  static foldByCount(
    entries: readonly CategoryValue[],
    threshold: number = DEFAULT_MINOR_COUNT_THRESHOLD
  ): CategoryShare[] {
    const folded = this.fold(entries, threshold);
    const total = sum(folded.map(entry => entry.value));
    return folded.map(entry => ({ ...entry, pct: calculatePercentage(entry.value, total) }));
  }

  /**
   * Fold categories whose amount is below the given quantile of all amounts
   */
  static foldByQuantile(
    entries: readonly CategoryValue[],
    q: number = DEFAULT_MINOR_AMOUNT_QUANTILE,
    floor: number = DEFAULT_MINOR_AMOUNT_FLOOR
  ): CategoryValue[] {
    const threshold = this.quantileThreshold(entries.map(entry => entry.value), q, floor);
    logger.debug(`Minor category amount threshold: ${threshold}`);
    return this.fold(entries, threshold);
  }

  /**
   * Quantile of the values, or the floor when that is undefined or not positive
   */
  static quantileThreshold(values: readonly number[], q: number, floor: number): number {
    const threshold = quantile(values, q);
    if (threshold === undefined || Number.isNaN(threshold) || threshold <= 0) {
      return floor;
    }
    return threshold;
  }

  private static fold(entries: readonly CategoryValue[], threshold: number): CategoryValue[] {
    const major = entries.filter(entry => entry.value >= threshold).map(entry => ({ ...entry }));
    const minor = entries.filter(entry => entry.value < threshold);

    if (minor.length > 0) {
      major.push({ category: OTHER_MINOR_PAYERS, value: sum(minor.map(entry => entry.value)) });
    }

    return major.sort((a, b) => b.value - a.value);
  }
}

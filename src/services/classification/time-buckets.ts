/**
 * Calendar month bucketing
 */

import { UNKNOWN } from '../../shared/types';

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const MONTH_KEY = /^(\d{4})-(\d{2})$/;

export class TimeBucketer {
  static monthKey(date: Date): string {
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    return `${date.getUTCFullYear()}-${month}`;
  }

  /**
   * YYYY-MM for a parsed date. Both an absent date column and an
   * individually unparseable date land in the Unknown bucket.
   */
  static bucketByMonth(date: Date | null, dateColumnPresent: boolean): string {
    if (!dateColumnPresent || !date) {
      return UNKNOWN;
    }
    return this.monthKey(date);
  }

  /**
   * 2025-01 -> Jan 2025; anything else is returned unchanged
   */
  static formatMonthLabel(key: string): string {
    const match = MONTH_KEY.exec(key);
    if (!match) return key;

    const monthIndex = Number(match[2]) - 1;
    const name = MONTH_NAMES[monthIndex];
    return name ? `${name} ${match[1]}` : key;
  }

  // Chronological, with Unknown after every month
  static compareMonthKeys(a: string, b: string): number {
    if (a === b) return 0;
    if (a === UNKNOWN) return 1;
    if (b === UNKNOWN) return -1;
    return a < b ? -1 : 1;
  }
}

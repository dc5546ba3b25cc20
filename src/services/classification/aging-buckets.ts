/**
 * AR aging bucket assignment
 */

import {
  AGING_BUCKET_BOUNDARIES,
  AGING_BUCKET_ORDER,
  AgingBucket,
  UNKNOWN_AGE_SENTINEL,
} from '../../shared/types';

export class AgingClassifier {
  /**
   * Assign aging bucket based on age in days. Boundary values belong to the
   * lower bucket; null ages take the sentinel and land in the oldest bucket;
   * negative ages (future dates of service) land in the first bucket.
   */
  static assignAgingBucket(agingDays: number | null): AgingBucket {
    const days = agingDays ?? UNKNOWN_AGE_SENTINEL;

    for (let i = 0; i < AGING_BUCKET_BOUNDARIES.length; i++) {
      if (days <= AGING_BUCKET_BOUNDARIES[i]) {
        return AGING_BUCKET_ORDER[i];
      }
    }
    return AgingBucket.ABOVE_ONE_TWENTY;
  }
}

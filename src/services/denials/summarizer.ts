/**
 * Denials Summarizer
 * Outstanding balance of denied claims by claim status group
 */

import { createServiceLogger } from '../../shared/logger';
import { Aggregator } from '../aggregation';
import { Claim } from '../claims';
import { DenialSummaryRow } from './interfaces';

const logger = createServiceLogger('denials');

const DENIAL_MARKER = 'den';

export class DenialsSummarizer {
  static isDenied(claim: Pick<Claim, 'claimStatusGroupName'>): boolean {
    return claim.claimStatusGroupName.toLowerCase().includes(DENIAL_MARKER);
  }

  /**
   * Distinct denied claims and summed balance per status group, largest count first
   */
  static summarize(claims: readonly Claim[]): DenialSummaryRow[] {
    const denied = claims.filter(claim => this.isDenied(claim));
    if (denied.length === 0) {
      logger.debug('No denied claims in batch');
      return [];
    }

    const table = Aggregator.aggregate(denied, {
      keyColumn: 'claimStatusGroupName',
      key: claim => claim.claimStatusGroupName,
      metrics: [
        { column: 'count', reducer: 'nunique', value: claim => claim.claimNo },
        { column: 'arBalance', reducer: 'sum', value: claim => claim.balance },
      ],
    });

    return table.rows
      .slice(0, -1)
      .map(row => ({
        claimStatusGroupName: row.key,
        count: row.values.count,
        arBalance: row.values.arBalance,
      }))
      .sort((a, b) => b.count - a.count);
  }
}

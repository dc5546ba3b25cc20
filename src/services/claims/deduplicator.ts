/**
 * Claim Deduplicator
 * Collapses line items to one representative row per claim number
 */

import { createServiceLogger } from '../../shared/logger';
import { daysBetween, toUtcDay } from '../../shared/utils';
import { ClaimLine } from '../normalizer';
import { Claim, ClaimDerivationContext } from './interfaces';

const logger = createServiceLogger('claims');

export class ClaimDeduplicator {
  /**
   * Keep the first line seen for every claim number, in input order.
   * Amounts are the representative line's own, not summed across lines.
   */
  static dedupeByClaimNo<T extends { claimNo: string }>(lines: readonly T[]): T[] {
    const seen = new Set<string>();
    const unique: T[] = [];

    for (const line of lines) {
      if (seen.has(line.claimNo)) continue;
      seen.add(line.claimNo);
      unique.push(line);
    }

    return unique;
  }

  static deriveBalance(line: ClaimLine, hasBalanceColumn: boolean): number {
    if (hasBalanceColumn) {
      return line.balance;
    }
    return line.billedCharge - line.totalPayment - line.contractualAdjustment;
  }

  static deriveAgingDays(serviceDate: Date | null, today: Date): number | null {
    if (!serviceDate) return null;
    return daysBetween(serviceDate, toUtcDay(today));
  }

  /**
   * Claim-level view: deduplicated lines with Balance and AgingDays attached
   */
  static deriveClaims(lines: readonly ClaimLine[], context: ClaimDerivationContext): Claim[] {
    const claims = this.dedupeByClaimNo(lines).map(line => ({
      ...line,
      balance: this.deriveBalance(line, context.hasBalanceColumn),
      agingDays: this.deriveAgingDays(line.serviceDate, context.today),
    }));

    logger.debug(`Collapsed ${lines.length} line items into ${claims.length} claims`);
    return claims;
  }
}

/**
 * Claim Deduplicator Interfaces and Types
 */

import { ClaimLine } from '../normalizer';

/**
 * Representative line of a claim, with claim-level derivations
 */
export interface Claim extends ClaimLine {
  balance: number;
  agingDays: number | null;
}

export interface ClaimDerivationContext {
  hasBalanceColumn: boolean;
  today: Date;
}

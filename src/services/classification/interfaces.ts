/**
 * Classification Engine Interfaces and Types
 */

export type ExclusionFilterName = 'excludedProvider' | 'selfPay' | 'patientStatus' | 'serviceDateCutoff';

export type KpiName = 'providerVisits' | 'payerMix' | 'arAging' | 'paymentsByPayer' | 'denials';

/**
 * Fields the exclusion predicates read; satisfied by claim lines and claims
 */
export interface FilterableRecord {
  renderingProvider: string;
  primaryPayer: string;
  claimStatusCode: string;
  serviceDate: Date | null;
}

export interface ExclusionContext {
  excludedProvider: string | null;
  dosCutoff: Date;
  // The cutoff only applies when the batch carries a date of service column
  serviceDateColumnPresent: boolean;
}

/**
 * Exclusion Filters
 * Composable predicates, applied per KPI according to KPI_FILTER_POLICY
 */

import { ExclusionContext, ExclusionFilterName, FilterableRecord, KpiName } from './interfaces';

/**
 * Which exclusions each KPI applies. The differences between reports are
 * intentional and kept in one table so they can be audited.
 */
export const KPI_FILTER_POLICY: Readonly<Record<KpiName, readonly ExclusionFilterName[]>> = {
  providerVisits: ['serviceDateCutoff', 'excludedProvider'],
  payerMix: [],
  arAging: ['selfPay', 'patientStatus'],
  paymentsByPayer: ['excludedProvider'],
  denials: [],
};

const SELF_PAY = 'SELF PAY';
const PATIENT_STATUS_MARKER = 'PAT';

type ExclusionPredicate = (record: FilterableRecord, context: ExclusionContext) => boolean;

const PREDICATES: Record<ExclusionFilterName, ExclusionPredicate> = {
  excludedProvider: (record, context) =>
    context.excludedProvider !== null &&
    record.renderingProvider.trim().toLowerCase() === context.excludedProvider.trim().toLowerCase(),

  selfPay: record => record.primaryPayer.trim().toUpperCase() === SELF_PAY,

  patientStatus: record => record.claimStatusCode.toUpperCase().includes(PATIENT_STATUS_MARKER),

  // Missing dates of service cannot be shown to be on or after the cutoff
  serviceDateCutoff: (record, context) =>
    context.serviceDateColumnPresent &&
    (record.serviceDate === null || record.serviceDate.getTime() < context.dosCutoff.getTime()),
};

export class ExclusionFilters {
  static isExcluded(record: FilterableRecord, filter: ExclusionFilterName, context: ExclusionContext): boolean {
    return PREDICATES[filter](record, context);
  }

  /**
   * Rows that no listed filter excludes; returns a new array
   */
  static apply<T extends FilterableRecord>(
    rows: readonly T[],
    filters: readonly ExclusionFilterName[],
    context: ExclusionContext
  ): T[] {
    return rows.filter(row => !filters.some(filter => this.isExcluded(row, filter, context)));
  }

  static forKpi<T extends FilterableRecord>(rows: readonly T[], kpi: KpiName, context: ExclusionContext): T[] {
    return this.apply(rows, KPI_FILTER_POLICY[kpi], context);
  }
}

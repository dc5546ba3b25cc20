/**
 * KPI Calculator
 * One method per report table; each declares its exclusions through KPI_FILTER_POLICY
 */

import { AGING_BUCKET_ORDER } from '../../shared/types';
import { Aggregator, CrossTab, MinorCategoryFolder } from '../aggregation';
import { Claim, ClaimDeduplicator } from '../claims';
import { AgingClassifier, ExclusionContext, ExclusionFilters, TimeBucketer } from '../classification';
import { ClaimLine, NormalizedTransactionBatch, Transaction } from '../normalizer';
import { ArAgingRow, MonthlyTransactionRow, PayerMixRow, PayerPaymentRow } from './interfaces';

export interface ProviderVisitOptions {
  claimDateColumnPresent: boolean;
}

const UNPOSTED_MARKER = 'unpost';

export class KpiCalculator {
  /**
   * Distinct claims per rendering provider and claim month
   */
  static providerVisits(
    claims: readonly Claim[],
    context: ExclusionContext,
    options: ProviderVisitOptions
  ): CrossTab {
    const visits = ClaimDeduplicator.dedupeByClaimNo(ExclusionFilters.forKpi(claims, 'providerVisits', context));

    return Aggregator.crossTabulate(visits, {
      rowKey: claim => claim.renderingProvider,
      columnKey: claim => TimeBucketer.bucketByMonth(claim.claimDate, options.claimDateColumnPresent),
      distinctKey: claim => claim.claimNo,
      compareColumns: (a, b) => TimeBucketer.compareMonthKeys(a, b),
    });
  }

  /**
   * Distinct claims per primary payer, small payers folded by count
   */
  static payerMix(claims: readonly Claim[], context: ExclusionContext, minorThreshold: number): PayerMixRow[] {
    const table = Aggregator.aggregate(ExclusionFilters.forKpi(claims, 'payerMix', context), {
      keyColumn: 'primaryPayer',
      key: claim => claim.primaryPayer,
      metrics: [{ column: 'claims', reducer: 'nunique', value: claim => claim.claimNo }],
    });

    const entries = table.rows.slice(0, -1).map(row => ({ category: row.key, value: row.values.claims }));
    return MinorCategoryFolder.foldByCount(entries, minorThreshold).map(entry => ({
      primaryPayer: entry.category,
      claims: entry.value,
      pct: entry.pct,
    }));
  }

  /**
   * Line-level insurance AR by days since date of service. Expected payments
   * are the allowed fee, including when that fee is zero.
   */
  static arAging(lines: readonly ClaimLine[], context: ExclusionContext, today: Date): ArAgingRow[] {
    const outstanding = ExclusionFilters.forKpi(lines, 'arAging', context);

    const table = Aggregator.aggregate(outstanding, {
      keyColumn: 'agingBucket',
      key: line => AgingClassifier.assignAgingBucket(ClaimDeduplicator.deriveAgingDays(line.serviceDate, today)),
      metrics: [
        { column: 'charges', reducer: 'sum', value: line => line.billedCharge },
        { column: 'allowedFee', reducer: 'sum', value: line => line.allowedFee },
        { column: 'expectedPayments', reducer: 'sum', value: line => line.allowedFee },
        { column: 'paymentsCollected', reducer: 'sum', value: line => line.totalPayment },
        { column: 'pending', reducer: 'sum', value: line => line.allowedFee - line.totalPayment },
      ],
      keyOrder: AGING_BUCKET_ORDER,
    });

    return table.rows.map(row => ({
      agingBucket: row.key,
      charges: row.values.charges,
      allowedFee: row.values.allowedFee,
      expectedPayments: row.values.expectedPayments,
      paymentsCollected: row.values.paymentsCollected,
      pending: row.values.pending,
    }));
  }

  /**
   * Charges, payments and adjustments per transaction month; null without a date column
   */
  static monthlyTransactions(batch: NormalizedTransactionBatch): MonthlyTransactionRow[] | null {
    if (!batch.dateColumn) {
      return null;
    }

    const table = Aggregator.aggregate(batch.transactions, {
      keyColumn: 'month',
      key: transaction => TimeBucketer.bucketByMonth(transaction.date, true),
      metrics: [
        { column: 'billedCharges', reducer: 'sum', value: transaction => transaction.billedCharges },
        { column: 'patientPayments', reducer: 'sum', value: transaction => transaction.patientPayments },
        { column: 'payerPayments', reducer: 'sum', value: transaction => transaction.payerPayments },
        { column: 'contractualAdjustments', reducer: 'sum', value: transaction => transaction.contractualAdjustments },
      ],
      compareKeys: (a, b) => TimeBucketer.compareMonthKeys(a, b),
    });

    return table.rows.map(row => ({
      month: row.key,
      transactionMonth: TimeBucketer.formatMonthLabel(row.key),
      billedCharges: row.values.billedCharges,
      patientPayments: row.values.patientPayments,
      payerPayments: row.values.payerPayments,
      contractualAdjustments: row.values.contractualAdjustments,
    }));
  }

  /**
   * Payer payments summed across line items, small payers folded by amount quantile
   */
  static paymentsByPayer(
    lines: readonly ClaimLine[],
    context: ExclusionContext,
    quantile: number,
    floor: number
  ): PayerPaymentRow[] {
    const table = Aggregator.aggregate(ExclusionFilters.forKpi(lines, 'paymentsByPayer', context), {
      keyColumn: 'primaryPayer',
      key: line => line.primaryPayer,
      metrics: [{ column: 'payerPayment', reducer: 'sum', value: line => line.payerPayment }],
    });

    const entries = table.rows.slice(0, -1).map(row => ({ category: row.key, value: row.values.payerPayment }));
    return MinorCategoryFolder.foldByQuantile(entries, quantile, floor).map(entry => ({
      primaryPayer: entry.category,
      payerPayment: entry.value,
    }));
  }

  static unpostedTransactions(batch: NormalizedTransactionBatch): Transaction[] {
    if (!batch.hasPostingStatusColumn) {
      return [];
    }
    return batch.transactions.filter(transaction =>
      (transaction.postingStatus ?? '').toLowerCase().includes(UNPOSTED_MARKER)
    );
  }
}

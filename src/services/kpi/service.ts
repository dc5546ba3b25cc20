/**
 * KPI Pipeline - Main Implementation
 * Runs every report module over one full batch and collects non-fatal issues
 */

import { createServiceLogger } from '../../shared/logger';
import { ResolvedKpiConfig, resolveConfig } from '../../shared/config';
import { MissingInputError, MissingRemittanceSchemaError } from '../../shared/errors';
import { PipelineIssue, TabularBatch } from '../../shared/types';
import { toIsoDate, toUtcDay } from '../../shared/utils';
import { ClaimDeduplicator } from '../claims';
import { ExclusionContext } from '../classification';
import { DenialsSummarizer } from '../denials';
import { RecordNormalizer } from '../normalizer';
import { RemittanceLedger, RemittanceNormalizer } from '../remittance';
import { KpiCalculator } from './calculator';
import { KpiReport, PipelineInput } from './interfaces';

const logger = createServiceLogger('kpi');

export class KpiPipeline {
  private readonly config: ResolvedKpiConfig;

  constructor(config: ResolvedKpiConfig = resolveConfig()) {
    this.config = config;
  }

  /**
   * @throws MissingInputError before any table is computed when the claim
   * detail or daily transactions batch is absent
   */
  run(input: PipelineInput): KpiReport {
    const startTime = Date.now();
    const { claimDetail, transactions } = input;

    if (!claimDetail || !transactions) {
      const missing: string[] = [];
      if (!claimDetail) missing.push('claim detail');
      if (!transactions) missing.push('daily transactions');
      logger.error(`Cannot run KPI pipeline: missing ${missing.join(', ')}`);
      throw new MissingInputError(missing);
    }

    const issues: PipelineIssue[] = [];
    const today = toUtcDay(input.today);

    const normalizedClaims = RecordNormalizer.normalizeClaimLines(claimDetail, this.config.claimColumns);
    const normalizedTransactions = RecordNormalizer.normalizeTransactions(
      transactions,
      this.config.transactionColumns
    );
    this.reportMissingColumns(claimDetail, normalizedClaims.missingColumns, issues);
    this.reportMissingColumns(transactions, normalizedTransactions.missingColumns, issues);

    const lineItems = normalizedClaims.lines;
    const claims = ClaimDeduplicator.deriveClaims(lineItems, {
      hasBalanceColumn: normalizedClaims.hasBalanceColumn,
      today,
    });

    const context: ExclusionContext = {
      excludedProvider: this.config.excludedProvider,
      dosCutoff: this.config.dosCutoff,
      serviceDateColumnPresent: normalizedClaims.serviceDateColumn !== null,
    };

    const providerVisits = KpiCalculator.providerVisits(claims, context, {
      claimDateColumnPresent: normalizedClaims.claimDateColumn !== null,
    });
    const payerMix = KpiCalculator.payerMix(claims, context, this.config.minorPayerClaimThreshold);
    const arAging = KpiCalculator.arAging(lineItems, context, today);

    const monthlyTransactions = KpiCalculator.monthlyTransactions(normalizedTransactions);
    if (monthlyTransactions === null) {
      this.addIssue(issues, {
        severity: 'warning',
        source: transactions.name,
        message: 'No transaction date column detected; monthly transaction summary cannot be produced',
      });
    }

    const paymentsByPayer = KpiCalculator.paymentsByPayer(
      lineItems,
      context,
      this.config.minorPaymentQuantile,
      this.config.minorPaymentFloor
    );
    const unpostedTransactions = KpiCalculator.unpostedTransactions(normalizedTransactions);
    const remittance = input.remittance ? this.normalizeRemittance(input.remittance, issues) : null;
    const denials = DenialsSummarizer.summarize(claims);

    logger.info(
      `KPI pipeline processed ${lineItems.length} line items (${claims.length} claims) and ` +
        `${normalizedTransactions.transactions.length} transactions in ${Date.now() - startTime}ms`
    );

    return {
      reportDate: toIsoDate(today),
      providerVisits,
      payerMix,
      arAging,
      monthlyTransactions,
      paymentsByPayer,
      unpostedTransactions,
      remittance,
      denials,
      datasets: {
        lineItems,
        claims,
        transactions: normalizedTransactions.transactions,
      },
      issues,
    };
  }

  /**
   * A remittance schema error drops the ERA ledger only
   */
  private normalizeRemittance(batch: TabularBatch, issues: PipelineIssue[]): RemittanceLedger | null {
    try {
      return RemittanceNormalizer.normalize(batch);
    } catch (error) {
      if (error instanceof MissingRemittanceSchemaError) {
        this.addIssue(issues, { severity: 'error', source: batch.name, message: error.message });
        return null;
      }
      throw error;
    }
  }

  private reportMissingColumns(batch: TabularBatch, missingColumns: string[], issues: PipelineIssue[]): void {
    if (missingColumns.length === 0) return;

    this.addIssue(issues, {
      severity: 'warning',
      source: batch.name,
      message: `Missing expected columns: ${missingColumns.join(', ')}. Best-effort processing applied.`,
    });
  }

  private addIssue(issues: PipelineIssue[], issue: PipelineIssue): void {
    issues.push(issue);
    const line = `[${issue.source}] ${issue.message}`;
    if (issue.severity === 'error') {
      logger.error(line);
    } else {
      logger.warn(line);
    }
  }
}

/**
 * KPI Pipeline Interfaces and Types
 */

import { PipelineIssue, TabularBatch } from '../../shared/types';
import { CrossTab } from '../aggregation';
import { Claim } from '../claims';
import { DenialSummaryRow } from '../denials';
import { ClaimLine, Transaction } from '../normalizer';
import { RemittanceLedger } from '../remittance';

export interface PipelineInput {
  claimDetail: TabularBatch | null | undefined;
  transactions: TabularBatch | null | undefined;
  remittance?: TabularBatch | null;
  // Supplied by the caller so aging is deterministic
  today: Date;
}

export interface PayerMixRow {
  primaryPayer: string;
  claims: number;
  pct: number;
}

export interface ArAgingRow {
  agingBucket: string;
  charges: number;
  allowedFee: number;
  expectedPayments: number;
  paymentsCollected: number;
  pending: number;
}

export interface MonthlyTransactionRow {
  month: string;
  transactionMonth: string;
  billedCharges: number;
  patientPayments: number;
  payerPayments: number;
  contractualAdjustments: number;
}

export interface PayerPaymentRow {
  primaryPayer: string;
  payerPayment: number;
}

export interface KpiDatasets {
  lineItems: ClaimLine[];
  claims: Claim[];
  transactions: Transaction[];
}

export interface KpiReport {
  reportDate: string;
  providerVisits: CrossTab;
  payerMix: PayerMixRow[];
  arAging: ArAgingRow[];
  monthlyTransactions: MonthlyTransactionRow[] | null;
  paymentsByPayer: PayerPaymentRow[];
  unpostedTransactions: Transaction[];
  remittance: RemittanceLedger | null;
  denials: DenialSummaryRow[];
  datasets: KpiDatasets;
  issues: PipelineIssue[];
}

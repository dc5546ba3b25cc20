/**
 * Record Normalizer Interfaces and Types
 */

import { SourceRow } from '../../shared/types';

export interface ClaimLine {
  claimNo: string;
  renderingProvider: string;
  primaryPayer: string;
  serviceDate: Date | null;
  claimDate: Date | null;
  claimStatusCode: string;
  claimStatusGroupName: string;
  billedCharge: number;
  payerCharge: number;
  totalPayment: number;
  payerPayment: number;
  patientPayment: number;
  contractualAdjustment: number;
  allowedFee: number;
  balance: number;
  source: SourceRow;
}

export interface Transaction {
  date: Date | null;
  billedCharges: number;
  selfPayCharges: number;
  payerCharges: number;
  totalPayments: number;
  patientPayments: number;
  payerPayments: number;
  contractualAdjustments: number;
  postingStatus: string | null;
  source: SourceRow;
}

export interface NormalizedClaimBatch {
  lines: ClaimLine[];
  serviceDateColumn: string | null;
  claimDateColumn: string | null;
  hasBalanceColumn: boolean;
  missingColumns: string[];
}

export interface NormalizedTransactionBatch {
  transactions: Transaction[];
  dateColumn: string | null;
  hasPostingStatusColumn: boolean;
  missingColumns: string[];
}

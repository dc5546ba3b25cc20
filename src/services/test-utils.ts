/**
 * Test Utilities
 * Batch fixtures shaped like the billing system's report exports
 */

import { SourceRow, TabularBatch } from '../shared/types';
import { ClaimLine, Transaction } from './normalizer';
import { Claim } from './claims';

export interface BatchOptions {
  name?: string;
  omit?: string[];
}

export const CLAIM_DETAIL_COLUMNS = [
  'Claim No',
  'Rendering Provider',
  'Primary Payer',
  'Start Date of Service',
  'Claim Date',
  'Claim Status Code',
  'Claim Status Group Name',
  'Billed Charge',
  'Payer Charge',
  'Total Payment',
  'Payer Payment',
  'Patient Payment',
  'Contractual Adjustment',
  'Fee Schedule Allowed Fee',
  'Total(Balance)',
];

export const TRANSACTION_COLUMNS = [
  'Date',
  'Billed Charges',
  'Self Pay Charges',
  'Payer Charges',
  'Total Payments',
  'Patient Payments',
  'Payer Payments',
  'Contractual Adjustments',
];

export const REMITTANCE_COLUMNS = ['Payer', 'Method', 'Dated', 'Trace', 'Amount'];

/**
 * Test data generators
 */
export class TestDataGenerator {
  static createClaimRow(overrides: SourceRow = {}): SourceRow {
    return {
      'Claim No': 'CLM-1001',
      'Rendering Provider': 'Smith, Jane',
      'Primary Payer': 'Medicare',
      'Start Date of Service': '2025-01-15',
      'Claim Date': '2025-01-20',
      'Claim Status Code': 'PAID',
      'Claim Status Group Name': 'Paid',
      'Billed Charge': '150.00',
      'Payer Charge': '120.00',
      'Total Payment': '100.00',
      'Payer Payment': '80.00',
      'Patient Payment': '20.00',
      'Contractual Adjustment': '30.00',
      'Fee Schedule Allowed Fee': '120.00',
      'Total(Balance)': '20.00',
      ...overrides,
    };
  }

  static createTransactionRow(overrides: SourceRow = {}): SourceRow {
    return {
      Date: '2025-01-10',
      'Billed Charges': '1000.00',
      'Self Pay Charges': '50.00',
      'Payer Charges': '950.00',
      'Total Payments': '600.00',
      'Patient Payments': '100.00',
      'Payer Payments': '500.00',
      'Contractual Adjustments': '200.00',
      ...overrides,
    };
  }

  static createRemittanceRow(overrides: SourceRow = {}): SourceRow {
    return {
      Payer: 'Medicare',
      Method: 'EFT',
      Dated: '2025-02-03',
      Trace: '884410023',
      Amount: '1250.50',
      ...overrides,
    };
  }

  static createClaimLine(overrides: Partial<ClaimLine> = {}): ClaimLine {
    return {
      claimNo: 'CLM-1001',
      renderingProvider: 'Smith, Jane',
      primaryPayer: 'Medicare',
      serviceDate: new Date('2025-01-15T00:00:00.000Z'),
      claimDate: new Date('2025-01-20T00:00:00.000Z'),
      claimStatusCode: 'PAID',
      claimStatusGroupName: 'Paid',
      billedCharge: 150,
      payerCharge: 120,
      totalPayment: 100,
      payerPayment: 80,
      patientPayment: 20,
      contractualAdjustment: 30,
      allowedFee: 120,
      balance: 20,
      source: {},
      ...overrides,
    };
  }

  static createClaim(overrides: Partial<Claim> = {}): Claim {
    return {
      ...this.createClaimLine(overrides),
      agingDays: 45,
      ...overrides,
    };
  }

  static createTransaction(overrides: Partial<Transaction> = {}): Transaction {
    return {
      date: new Date('2025-01-10T00:00:00.000Z'),
      billedCharges: 1000,
      selfPayCharges: 50,
      payerCharges: 950,
      totalPayments: 600,
      patientPayments: 100,
      payerPayments: 500,
      contractualAdjustments: 200,
      postingStatus: null,
      source: {},
      ...overrides,
    };
  }

  static createClaimBatch(rows: SourceRow[], options: BatchOptions = {}): TabularBatch {
    return this.createBatch(options.name ?? 'claim-detail.csv', CLAIM_DETAIL_COLUMNS, rows, options.omit);
  }

  static createTransactionBatch(rows: SourceRow[], options: BatchOptions = {}): TabularBatch {
    return this.createBatch(options.name ?? 'daily-transactions.csv', TRANSACTION_COLUMNS, rows, options.omit);
  }

  static createRemittanceBatch(rows: SourceRow[], options: BatchOptions = {}): TabularBatch {
    return this.createBatch(options.name ?? 'era.xlsx', REMITTANCE_COLUMNS, rows, options.omit);
  }

  private static createBatch(
    name: string,
    columns: string[],
    rows: SourceRow[],
    omit: string[] = []
  ): TabularBatch {
    const extraColumns = rows
      .flatMap(row => Object.keys(row))
      .filter(column => !columns.includes(column));

    return {
      name,
      columns: [...columns, ...new Set(extraColumns)].filter(column => !omit.includes(column)),
      rows: rows.map(row => {
        const copy: SourceRow = { ...row };
        for (const column of omit) {
          delete copy[column];
        }
        return copy;
      }),
    };
  }
}

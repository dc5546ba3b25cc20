/**
 * Record Normalizer
 * Parses dates, coerces monetary fields and fills categorical sentinels.
 * Rows are never dropped; unparseable cells become null (dates) or 0 (amounts).
 */

import { createServiceLogger } from '../../shared/logger';
import { DEFAULT_CLAIM_COLUMNS, DEFAULT_TRANSACTION_COLUMNS } from '../../shared/config';
import { toCalendarDay } from '../../shared/utils';
import {
  CellValue,
  ClaimColumns,
  TabularBatch,
  TransactionColumns,
  UNKNOWN,
} from '../../shared/types';
import {
  ClaimLine,
  NormalizedClaimBatch,
  NormalizedTransactionBatch,
  Transaction,
} from './interfaces';

const logger = createServiceLogger('normalizer');

const YEAR_FIRST_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s].*)?$/;
const MONTH_FIRST_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})(?:\s.*)?$/;
const PLAIN_NUMBER = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export class RecordNormalizer {
  /**
   * First candidate column present in the batch, or null
   */
  static detectColumn(batch: TabularBatch, candidates: readonly string[]): string | null {
    return candidates.find(candidate => batch.columns.includes(candidate)) ?? null;
  }

  /**
   * Report expected columns that are absent. Never fatal.
   */
  static validateColumns(batch: TabularBatch, required: readonly string[]): string[] {
    const missing = required.filter(column => !batch.columns.includes(column));
    if (missing.length > 0) {
      logger.warn(`Batch '${batch.name}' is missing expected columns: ${missing.join(', ')}`);
    }
    return missing;
  }

  static parseDate(value: CellValue | undefined): Date | null {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : toCalendarDay(value);
    }
    if (typeof value !== 'string') {
      return null;
    }

    const text = value.trim();
    const yearFirst = YEAR_FIRST_DATE.exec(text);
    if (yearFirst) {
      return this.calendarDate(Number(yearFirst[1]), Number(yearFirst[2]), Number(yearFirst[3]));
    }

    const monthFirst = MONTH_FIRST_DATE.exec(text);
    if (monthFirst) {
      const year = monthFirst[3].length === 2 ? 2000 + Number(monthFirst[3]) : Number(monthFirst[3]);
      return this.calendarDate(year, Number(monthFirst[1]), Number(monthFirst[2]));
    }

    return null;
  }

  static parseAmount(value: CellValue | undefined): number {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : 0;
    }
    if (typeof value !== 'string') {
      return 0;
    }

    let text = value.trim();
    const parenthesized = /^\(.*\)$/.test(text);
    text = text.replace(/[()$,\s]/g, '');
    if (!PLAIN_NUMBER.test(text)) {
      return 0;
    }

    const amount = Number(text);
    if (!Number.isFinite(amount)) return 0;
    return parenthesized ? -Math.abs(amount) : amount;
  }

  static parseText(value: CellValue | undefined, fallback: string): string {
    if (value === null || value === undefined) return fallback;
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? fallback : value.toISOString().slice(0, 10);
    }
    const text = String(value);
    return text === '' ? fallback : text;
  }

  /**
   * Normalize a claim-detail batch into claim lines
   */
  static normalizeClaimLines(
    batch: TabularBatch,
    columns: ClaimColumns = DEFAULT_CLAIM_COLUMNS
  ): NormalizedClaimBatch {
    const serviceDateColumn = this.detectColumn(batch, columns.serviceDate);
    const claimDateColumn = this.detectColumn(batch, columns.claimDate);
    const hasBalanceColumn = batch.columns.includes(columns.balance);

    const missingColumns = this.validateColumns(batch, [
      columns.claimStatusCode,
      columns.claimStatusGroupName,
      columns.primaryPayer,
      columns.claimNo,
      columns.renderingProvider,
      columns.billedCharge,
      columns.payerCharge,
      columns.totalPayment,
      columns.payerPayment,
      columns.patientPayment,
      columns.contractualAdjustment,
      columns.allowedFee,
      columns.balance,
    ]);
    if (!serviceDateColumn) {
      missingColumns.push(columns.serviceDate.join(' | '));
      logger.warn(`Batch '${batch.name}' has no date of service column; aging falls back to the oldest bucket`);
    }

    const lines: ClaimLine[] = batch.rows.map(row => ({
      claimNo: this.parseText(row[columns.claimNo], ''),
      renderingProvider: this.parseText(row[columns.renderingProvider], UNKNOWN),
      primaryPayer: this.parseText(row[columns.primaryPayer], UNKNOWN),
      serviceDate: serviceDateColumn ? this.parseDate(row[serviceDateColumn]) : null,
      claimDate: claimDateColumn ? this.parseDate(row[claimDateColumn]) : null,
      claimStatusCode: this.parseText(row[columns.claimStatusCode], ''),
      claimStatusGroupName: this.parseText(row[columns.claimStatusGroupName], ''),
      billedCharge: this.parseAmount(row[columns.billedCharge]),
      payerCharge: this.parseAmount(row[columns.payerCharge]),
      totalPayment: this.parseAmount(row[columns.totalPayment]),
      payerPayment: this.parseAmount(row[columns.payerPayment]),
      patientPayment: this.parseAmount(row[columns.patientPayment]),
      contractualAdjustment: this.parseAmount(row[columns.contractualAdjustment]),
      allowedFee: this.parseAmount(row[columns.allowedFee]),
      balance: this.parseAmount(row[columns.balance]),
      source: row,
    }));

    logger.debug(`Normalized ${lines.length} claim lines from '${batch.name}'`);

    return { lines, serviceDateColumn, claimDateColumn, hasBalanceColumn, missingColumns };
  }

  /**
   * Normalize a daily-transactions batch
   */
  static normalizeTransactions(
    batch: TabularBatch,
    columns: TransactionColumns = DEFAULT_TRANSACTION_COLUMNS
  ): NormalizedTransactionBatch {
    const dateColumn = this.detectColumn(batch, columns.date);
    const hasPostingStatusColumn = batch.columns.includes(columns.postingStatus);

    const missingColumns = this.validateColumns(batch, [
      columns.billedCharges,
      columns.selfPayCharges,
      columns.payerCharges,
      columns.totalPayments,
      columns.patientPayments,
      columns.payerPayments,
      columns.contractualAdjustments,
    ]);
    if (!dateColumn) {
      missingColumns.unshift(columns.date.join(' | '));
    }

    const transactions: Transaction[] = batch.rows.map(row => ({
      date: dateColumn ? this.parseDate(row[dateColumn]) : null,
      billedCharges: this.parseAmount(row[columns.billedCharges]),
      selfPayCharges: this.parseAmount(row[columns.selfPayCharges]),
      payerCharges: this.parseAmount(row[columns.payerCharges]),
      totalPayments: this.parseAmount(row[columns.totalPayments]),
      patientPayments: this.parseAmount(row[columns.patientPayments]),
      payerPayments: this.parseAmount(row[columns.payerPayments]),
      contractualAdjustments: this.parseAmount(row[columns.contractualAdjustments]),
      postingStatus: hasPostingStatusColumn ? this.parseText(row[columns.postingStatus], '') : null,
      source: row,
    }));

    logger.debug(`Normalized ${transactions.length} transactions from '${batch.name}'`);

    return { transactions, dateColumn, hasPostingStatusColumn, missingColumns };
  }

  private static calendarDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    const valid =
      date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
    return valid ? date : null;
  }
}

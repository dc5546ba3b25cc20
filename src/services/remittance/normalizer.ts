/**
 * Remittance Normalizer
 * Reshapes an ERA payment feed into the canonical ledger. All five fields are
 * required: a partial ledger would understate cash received.
 */

import { createServiceLogger } from '../../shared/logger';
import { MissingRemittanceSchemaError } from '../../shared/errors';
import { CellValue, GRAND_TOTAL, SourceRow, TabularBatch } from '../../shared/types';
import { sum, toIsoDate } from '../../shared/utils';
import { RecordNormalizer } from '../normalizer';
import { RemittanceEntry, RemittanceField, RemittanceLedger } from './interfaces';

const logger = createServiceLogger('remittance');

// Source column first, canonical ledger column second
export const REMITTANCE_SOURCE_COLUMNS: Readonly<Record<RemittanceField, readonly [string, string]>> = {
  payer: ['Payer', 'PAYER'],
  method: ['Method', 'METHOD'],
  date: ['Dated', 'DATE'],
  checkNumber: ['Trace', 'CHECK/EFT #'],
  amount: ['Amount', 'AMOUNT'],
};

const FIELDS: readonly RemittanceField[] = ['payer', 'method', 'date', 'checkNumber', 'amount'];

export class RemittanceNormalizer {
  /**
   * @throws MissingRemittanceSchemaError when any required field is absent
   */
  static normalize(batch: TabularBatch): RemittanceLedger {
    const resolved: Partial<Record<RemittanceField, string>> = {};
    const missing: string[] = [];

    for (const field of FIELDS) {
      const column = RecordNormalizer.detectColumn(batch, REMITTANCE_SOURCE_COLUMNS[field]);
      if (column) {
        resolved[field] = column;
      } else {
        missing.push(REMITTANCE_SOURCE_COLUMNS[field][0]);
      }
    }

    if (missing.length > 0) {
      logger.error(`Remittance batch '${batch.name}' is missing required fields: ${missing.join(', ')}`);
      throw new MissingRemittanceSchemaError(missing);
    }

    const read = (row: SourceRow, field: RemittanceField): CellValue | undefined => {
      const column = resolved[field];
      return column === undefined ? undefined : row[column];
    };

    const entries = batch.rows
      .map(row => ({
        payer: RecordNormalizer.parseText(read(row, 'payer'), ''),
        method: RecordNormalizer.parseText(read(row, 'method'), ''),
        date: this.formatDate(read(row, 'date')),
        checkNumber: this.formatCheckNumber(read(row, 'checkNumber')),
        amount: RecordNormalizer.parseAmount(read(row, 'amount')),
      }))
      .filter(entry => !this.isGrandTotal(entry))
      .sort((a, b) => b.amount - a.amount);

    const totalAmount = sum(entries.map(entry => entry.amount));
    logger.info(`Normalized ${entries.length} remittance payments totalling ${totalAmount.toFixed(2)}`);

    return {
      rows: [...entries, { payer: GRAND_TOTAL, method: '', date: '', checkNumber: '', amount: totalAmount }],
      totalAmount,
    };
  }

  /**
   * Ledger as a batch with the canonical column names
   */
  static toBatch(ledger: RemittanceLedger, name: string = 'ERA'): TabularBatch {
    return {
      name,
      columns: FIELDS.map(field => REMITTANCE_SOURCE_COLUMNS[field][1]),
      rows: ledger.rows.map(entry => {
        const row: SourceRow = {};
        for (const field of FIELDS) {
          row[REMITTANCE_SOURCE_COLUMNS[field][1]] = entry[field];
        }
        return row;
      }),
    };
  }

  /**
   * Check and trace numbers stay text; integral numbers are written out in
   * full instead of in exponent form
   */
  static formatCheckNumber(value: CellValue | undefined): string {
    if (typeof value === 'number' && Number.isInteger(value)) {
      return BigInt(value).toString();
    }
    return RecordNormalizer.parseText(value, '');
  }

  static formatDate(value: CellValue | undefined): string {
    const date = RecordNormalizer.parseDate(value);
    return date ? toIsoDate(date) : '';
  }

  private static isGrandTotal(entry: RemittanceEntry): boolean {
    return entry.payer === GRAND_TOTAL && entry.method === '' && entry.checkNumber === '';
  }
}

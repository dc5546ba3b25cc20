/**
 * Remittance (ERA) Interfaces and Types
 */

export type RemittanceField = 'payer' | 'method' | 'date' | 'checkNumber' | 'amount';

export interface RemittanceEntry {
  payer: string;
  method: string;
  date: string;
  checkNumber: string;
  amount: number;
}

/**
 * Canonical payment ledger, sorted by amount; the last row is always the Grand Total
 */
export interface RemittanceLedger {
  rows: RemittanceEntry[];
  totalAmount: number;
}

/**
 * KPI Report Generator
 * Plain-text rendering of a computed KPI report for the terminal
 */

import { formatCurrency } from '../../shared/utils';
import { CrossTab } from '../aggregation';
import { KpiReport } from './interfaces';

export class KpiReportGenerator {
  /**
   * Generate formatted text report
   */
  static generateTextReport(report: KpiReport): string {
    const sections: string[] = [`WEEKLY KPI REPORT - ${report.reportDate}`];

    if (report.issues.length > 0) {
      sections.push(
        this.section(
          'ISSUES',
          report.issues.map(issue => `${issue.severity.toUpperCase()} [${issue.source}] ${issue.message}`).join('\n')
        )
      );
    }

    sections.push(this.section('PROVIDER LEVEL VISITS BREAKDOWN', this.formatCrossTab(report.providerVisits)));

    sections.push(
      this.section(
        'PAYER MIX BASED ON VISITS',
        this.formatTable(
          ['Primary Payer', 'Claims', 'Pct'],
          report.payerMix.map(row => [row.primaryPayer, String(row.claims), row.pct.toFixed(2)])
        )
      )
    );

    sections.push(
      this.section(
        'INSURANCE AR AGING',
        this.formatTable(
          ['Aging Bucket', 'Charges', 'Allowed Fee', 'Expected Payments', 'Payments Collected', 'Pending'],
          report.arAging.map(row => [
            row.agingBucket,
            formatCurrency(row.charges),
            formatCurrency(row.allowedFee),
            formatCurrency(row.expectedPayments),
            formatCurrency(row.paymentsCollected),
            formatCurrency(row.pending),
          ])
        )
      )
    );

    sections.push(
      this.section(
        'CHARGES, PAYMENTS, & ADJUSTMENTS',
        report.monthlyTransactions === null
          ? 'Monthly summary unavailable: no transaction date column.'
          : this.formatTable(
              ['Transaction Month', 'Billed Charges', 'Patient Payments', 'Payer Payments', 'Contractual Adjustments'],
              report.monthlyTransactions.map(row => [
                row.transactionMonth,
                formatCurrency(row.billedCharges),
                formatCurrency(row.patientPayments),
                formatCurrency(row.payerPayments),
                formatCurrency(row.contractualAdjustments),
              ])
            )
      )
    );

    sections.push(
      this.section(
        'PAYMENTS BY PAYER',
        this.formatTable(
          ['Primary Payer', 'Payer Payment'],
          report.paymentsByPayer.map(row => [row.primaryPayer, formatCurrency(row.payerPayment)])
        )
      )
    );

    sections.push(this.section('UNPOSTED PAYMENTS', this.formatUnposted(report)));

    sections.push(
      this.section(
        'DENIALS',
        report.denials.length === 0
          ? 'No denied claims.'
          : this.formatTable(
              ['Claim Status Group', 'Count', 'AR Balance'],
              report.denials.map(row => [row.claimStatusGroupName, String(row.count), formatCurrency(row.arBalance)])
            )
      )
    );

    return sections.join('\n\n') + '\n';
  }

  /**
   * Align columns: the first left-aligned, the rest right-aligned
   */
  static formatTable(headers: string[], rows: string[][]): string {
    const widths = headers.map((header, index) =>
      Math.max(header.length, ...rows.map(row => (row[index] ?? '').length))
    );
    const formatRow = (cells: string[]) =>
      widths
        .map((width, index) => {
          const cell = cells[index] ?? '';
          return index === 0 ? cell.padEnd(width) : cell.padStart(width);
        })
        .join(' | ')
        .trimEnd();

    const headerLine = formatRow(headers);
    const separator = '-'.repeat(widths.reduce((total, width) => total + width, 0) + 3 * (widths.length - 1));
    return [headerLine, separator, ...rows.map(formatRow)].join('\n');
  }

  private static formatCrossTab(table: CrossTab): string {
    return this.formatTable(
      ['Rendering Provider', ...table.columns, 'Grand Total', '% Share'],
      table.rows.map(row => [
        row.key,
        ...table.columns.map(column => String(row.counts[column] ?? 0)),
        String(row.grandTotal),
        String(row.sharePct),
      ])
    );
  }

  private static formatUnposted(report: KpiReport): string {
    const lines = [`Unposted transactions: ${report.unpostedTransactions.length}`];

    if (report.remittance) {
      lines.push(
        '',
        this.formatTable(
          ['Payer', 'Method', 'Date', 'Check/EFT #', 'Amount'],
          report.remittance.rows.map(row => [
            row.payer,
            row.method,
            row.date,
            row.checkNumber,
            formatCurrency(row.amount),
          ])
        )
      );
    }

    return lines.join('\n');
  }

  private static section(title: string, body: string): string {
    return `=== ${title} ===\n${body}`;
  }
}

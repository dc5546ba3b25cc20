import { Aggregator } from '../aggregator';
import { AggregateTable } from '../interfaces';
import { TimeBucketer } from '../../classification';

interface PaymentRow {
  claimNo: string;
  payer: string;
  amount: number;
}

interface VisitRow {
  provider: string;
  month: string;
  claimNo: string;
}

const aggregateByPayer = (rows: PaymentRow[]): AggregateTable =>
  Aggregator.aggregate(rows, {
    keyColumn: 'payer',
    key: row => row.payer,
    metrics: [
      { column: 'claims', reducer: 'nunique', value: row => row.claimNo },
      { column: 'amount', reducer: 'sum', value: row => row.amount },
    ],
  });

describe('Aggregator', () => {
  describe('aggregate', () => {
    it('should group rows by key with sum and distinct-count metrics', () => {
      const table = aggregateByPayer([
        { claimNo: '1', payer: 'B', amount: 10.5 },
        { claimNo: '2', payer: 'A', amount: 4.25 },
        { claimNo: '3', payer: 'B', amount: 1 },
        { claimNo: '1', payer: 'B', amount: 10.5 },
      ]);

      expect(table.keyColumn).toBe('payer');
      expect(table.metricColumns).toEqual(['claims', 'amount']);
      expect(table.rows).toEqual([
        { key: 'A', values: { claims: 1, amount: 4.25 } },
        { key: 'B', values: { claims: 2, amount: 22 } },
        { key: 'Grand Total', values: { claims: 3, amount: 26.25 } },
      ]);
    });

    it('should append exactly one Grand Total row equal to the column sums', () => {
      const table = aggregateByPayer([
        { claimNo: '1', payer: 'A', amount: 0.1 },
        { claimNo: '2', payer: 'B', amount: 0.2 },
        { claimNo: '3', payer: 'C', amount: 0.7 },
        { claimNo: '4', payer: 'C', amount: 1.15 },
      ]);

      const totals = table.rows.filter(row => row.key === 'Grand Total');
      const dataRows = table.rows.slice(0, -1);

      expect(totals).toHaveLength(1);
      expect(table.rows[table.rows.length - 1]).toBe(totals[0]);
      expect(totals[0].values.amount).toBeCloseTo(dataRows.reduce((s, r) => s + r.values.amount, 0), 10);
      expect(totals[0].values.claims).toBe(4);
    });

    it('should emit zero rows for keys listed in keyOrder', () => {
      const table = Aggregator.aggregate([{ bucket: 'y', amount: 5 }], {
        keyColumn: 'bucket',
        key: row => row.bucket,
        metrics: [{ column: 'amount', reducer: 'sum', value: row => row.amount }],
        keyOrder: ['x', 'y', 'z'],
      });

      expect(table.rows.map(row => [row.key, row.values.amount])).toEqual([
        ['x', 0],
        ['y', 5],
        ['z', 0],
        ['Grand Total', 5],
      ]);
    });

    it('should produce only a zero Grand Total for an empty batch', () => {
      expect(aggregateByPayer([]).rows).toEqual([{ key: 'Grand Total', values: { claims: 0, amount: 0 } }]);
    });
  });

  describe('crossTabulate', () => {
    const crossTab = (rows: VisitRow[]) =>
      Aggregator.crossTabulate(rows, {
        rowKey: row => row.provider,
        columnKey: row => row.month,
        distinctKey: row => row.claimNo,
        compareColumns: (a, b) => TimeBucketer.compareMonthKeys(a, b),
      });

    it('should count distinct claims per provider and month with totals and shares', () => {
      const result = crossTab([
        { provider: 'P2', month: 'Unknown', claimNo: 'e' },
        { provider: 'P1', month: '2025-02', claimNo: 'c' },
        { provider: 'P1', month: '2025-01', claimNo: 'a' },
        { provider: 'P2', month: '2025-01', claimNo: 'd' },
        { provider: 'P1', month: '2025-01', claimNo: 'b' },
        { provider: 'P1', month: '2025-01', claimNo: 'b' },
      ]);

      expect(result.columns).toEqual(['2025-01', '2025-02', 'Unknown']);
      expect(result.rows).toEqual([
        { key: 'P1', counts: { '2025-01': 2, '2025-02': 1, Unknown: 0 }, grandTotal: 3, sharePct: 60 },
        { key: 'P2', counts: { '2025-01': 1, '2025-02': 0, Unknown: 1 }, grandTotal: 2, sharePct: 40 },
        { key: 'Grand Total', counts: { '2025-01': 3, '2025-02': 1, Unknown: 1 }, grandTotal: 5, sharePct: 100 },
      ]);
    });

    it('should round shares to the nearest whole percent', () => {
      const result = crossTab([
        { provider: 'A', month: '2025-01', claimNo: '1' },
        { provider: 'B', month: '2025-01', claimNo: '2' },
        { provider: 'C', month: '2025-01', claimNo: '3' },
      ]);

      expect(result.rows.map(row => row.sharePct)).toEqual([33, 33, 33, 100]);
    });

    it('should return a zero Grand Total row for an empty batch', () => {
      const result = crossTab([]);

      expect(result.columns).toEqual([]);
      expect(result.rows).toEqual([{ key: 'Grand Total', counts: {}, grandTotal: 0, sharePct: 0 }]);
    });
  });
});

/**
 * Aggregator
 * Group-by with sum / count-distinct metrics and an appended Grand Total row
 */

import { GRAND_TOTAL } from '../../shared/types';
import { compareKeys, sum } from '../../shared/utils';
import {
  AggregateRow,
  AggregateSpec,
  AggregateTable,
  CrossTab,
  CrossTabRow,
  CrossTabSpec,
} from './interfaces';

interface GroupAccumulator {
  sums: number[];
  distinct: Set<string>[];
}

export class Aggregator {
  /**
   * One row per distinct key plus a Grand Total row. For count-distinct
   * metrics the total is the sum of the per-group counts.
   */
  static aggregate<T>(rows: readonly T[], spec: AggregateSpec<T>): AggregateTable {
    const groups = new Map<string, GroupAccumulator>();

    for (const row of rows) {
      const key = spec.key(row);
      const group = groups.get(key) ?? {
        sums: spec.metrics.map(() => 0),
        distinct: spec.metrics.map(() => new Set<string>()),
      };
      groups.set(key, group);

      spec.metrics.forEach((metric, index) => {
        if (metric.reducer === 'sum') {
          group.sums[index] += metric.value(row);
        } else {
          group.distinct[index].add(metric.value(row));
        }
      });
    }

    const compare = spec.compareKeys ?? compareKeys;
    const keys = spec.keyOrder
      ? [...spec.keyOrder, ...[...groups.keys()].filter(key => !spec.keyOrder?.includes(key)).sort(compare)]
      : [...groups.keys()].sort(compare);

    const metricColumns = spec.metrics.map(metric => metric.column);
    const dataRows: AggregateRow[] = keys.map(key => {
      const group = groups.get(key);
      const values: Record<string, number> = {};
      spec.metrics.forEach((metric, index) => {
        if (!group) {
          values[metric.column] = 0;
        } else {
          values[metric.column] = metric.reducer === 'sum' ? group.sums[index] : group.distinct[index].size;
        }
      });
      return { key, values };
    });

    return {
      keyColumn: spec.keyColumn,
      metricColumns,
      rows: [...dataRows, this.grandTotalRow(dataRows, metricColumns)],
    };
  }

  static grandTotalRow(rows: readonly AggregateRow[], metricColumns: readonly string[]): AggregateRow {
    const values: Record<string, number> = {};
    for (const column of metricColumns) {
      values[column] = sum(rows.map(row => row.values[column]));
    }
    return { key: GRAND_TOTAL, values };
  }

  /**
   * Distinct counts by row key x column key, with a Grand Total column,
   * a Grand Total row and each row's rounded percentage of the overall total
   */
  static crossTabulate<T>(rows: readonly T[], spec: CrossTabSpec<T>): CrossTab {
    const cells = new Map<string, Map<string, Set<string>>>();
    const columnSet = new Set<string>();

    for (const row of rows) {
      const rowKey = spec.rowKey(row);
      const columnKey = spec.columnKey(row);
      columnSet.add(columnKey);

      const rowCells = cells.get(rowKey) ?? new Map<string, Set<string>>();
      cells.set(rowKey, rowCells);
      const distinct = rowCells.get(columnKey) ?? new Set<string>();
      rowCells.set(columnKey, distinct);
      distinct.add(spec.distinctKey(row));
    }

    const columns = [...columnSet].sort(spec.compareColumns ?? compareKeys);
    const rowKeys = [...cells.keys()].sort(compareKeys);

    const dataRows = rowKeys.map(rowKey => {
      const counts: Record<string, number> = {};
      for (const column of columns) {
        counts[column] = cells.get(rowKey)?.get(column)?.size ?? 0;
      }
      return { key: rowKey, counts, grandTotal: sum(Object.values(counts)) };
    });

    const totalCounts: Record<string, number> = {};
    for (const column of columns) {
      totalCounts[column] = sum(dataRows.map(row => row.counts[column]));
    }
    const totalRow = { key: GRAND_TOTAL, counts: totalCounts, grandTotal: sum(dataRows.map(row => row.grandTotal)) };

    const overall = totalRow.grandTotal;
    const withShare = (row: Omit<CrossTabRow, 'sharePct'>): CrossTabRow => ({
      ...row,
      sharePct: overall === 0 ? 0 : Math.round((row.grandTotal / overall) * 100),
    });

    return {
      columns,
      rows: [...dataRows.map(withShare), withShare(totalRow)],
    };
  }
}

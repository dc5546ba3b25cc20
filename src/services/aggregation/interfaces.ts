/**
 * Aggregator and Minor-Category Folder Interfaces and Types
 */

export type Reducer = 'sum' | 'nunique';

export type MetricSpec<T> =
  | { column: string; reducer: 'sum'; value: (row: T) => number }
  | { column: string; reducer: 'nunique'; value: (row: T) => string };

export interface AggregateSpec<T> {
  keyColumn: string;
  key: (row: T) => string;
  metrics: MetricSpec<T>[];
  // Fixed key order; listed keys are emitted even with no rows
  keyOrder?: readonly string[];
  compareKeys?: (a: string, b: string) => number;
}

export interface AggregateRow {
  key: string;
  values: Record<string, number>;
}

/**
 * Grouped table; the last row is always the Grand Total
 */
export interface AggregateTable {
  keyColumn: string;
  metricColumns: string[];
  rows: AggregateRow[];
}

export interface CrossTabSpec<T> {
  rowKey: (row: T) => string;
  columnKey: (row: T) => string;
  distinctKey: (row: T) => string;
  compareColumns?: (a: string, b: string) => number;
}

export interface CrossTabRow {
  key: string;
  counts: Record<string, number>;
  grandTotal: number;
  sharePct: number;
}

/**
 * Row key x column key distinct counts; the last row is always the Grand Total
 */
export interface CrossTab {
  columns: string[];
  rows: CrossTabRow[];
}

export interface CategoryValue {
  category: string;
  value: number;
}

export interface CategoryShare extends CategoryValue {
  pct: number;
}

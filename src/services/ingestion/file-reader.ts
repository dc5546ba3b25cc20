/**
 * Tabular File Reader
 * Reads billing report exports (.csv, .xlsx, .xls) into tabular batches
 */

import { readFileSync } from 'fs';
import { basename, extname } from 'path';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { createServiceLogger } from '../../shared/logger';
import { UnsupportedFileError } from '../../shared/errors';
import { CellValue, SourceRow, TabularBatch } from '../../shared/types';
import { toCalendarDay, toIsoDate } from '../../shared/utils';
import { ReadOptions, SourceFormat } from './interfaces';

const logger = createServiceLogger('ingestion');

const FORMATS: Record<string, SourceFormat> = {
  '.csv': 'csv',
  '.xlsx': 'xlsx',
  '.xls': 'xlsx',
};

export class TabularFileReader {
  static detectFormat(filePath: string): SourceFormat {
    const format = FORMATS[extname(filePath).toLowerCase()];
    if (!format) {
      throw new UnsupportedFileError(filePath);
    }
    return format;
  }

  /**
   * Read a file into a batch. The first row is the header; the first
   * worksheet is used for spreadsheets.
   */
  static read(filePath: string, options: ReadOptions = {}): TabularBatch {
    const format = this.detectFormat(filePath);
    const name = options.name ?? basename(filePath);

    logger.info(`Reading ${format} batch from file: ${filePath}`);
    const content = readFileSync(filePath);
    const batch = format === 'csv' ? this.parseCsv(content.toString('utf-8'), name) : this.parseWorkbook(content, name);

    logger.info(`Loaded ${batch.rows.length} rows and ${batch.columns.length} columns from ${name}`);
    return batch;
  }

  static parseCsv(content: string, name: string): TabularBatch {
    const records: unknown = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });

    return this.fromGrid(Array.isArray(records) ? records : [], name);
  }

  static parseWorkbook(content: Buffer, name: string): TabularBatch {
    const workbook = XLSX.read(content, { type: 'buffer', cellDates: true });
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
    if (!sheet) {
      logger.warn(`Workbook ${name} has no worksheets`);
      return { name, columns: [], rows: [] };
    }

    const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
      header: 1,
      defval: null,
      raw: true,
      blankrows: false,
    });
    return this.fromGrid(grid, name);
  }

  /**
   * Spreadsheet date cells become ISO calendar dates (local components, as
   * the workbook shows them)
   */
  static toCellValue(value: unknown): CellValue {
    if (value === null || value === undefined) return null;
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? null : toIsoDate(toCalendarDay(value));
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value;
    }
    return String(value);
  }

  private static fromGrid(grid: readonly unknown[], name: string): TabularBatch {
    const rows = grid.filter((row): row is unknown[] => Array.isArray(row));
    if (rows.length === 0) {
      logger.warn(`No rows found in ${name}`);
      return { name, columns: [], rows: [] };
    }

    const columns = rows[0].map((cell, index) => {
      const header = this.toCellValue(cell);
      return header === null || header === '' ? `Column ${index + 1}` : String(header).trim();
    });

    return {
      name,
      columns,
      rows: rows.slice(1).map(cells => {
        const row: SourceRow = {};
        columns.forEach((column, index) => {
          row[column] = this.toCellValue(cells[index]);
        });
        return row;
      }),
    };
  }
}

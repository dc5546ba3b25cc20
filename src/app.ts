#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { promises as fs } from 'fs';
import { logger } from './shared/logger';
import { loadConfig, ResolvedKpiConfig } from './shared/config';
import { ConfigurationError } from './shared/errors';
import { BatchLoader } from './services/ingestion';
import { KpiPipeline, KpiReport, KpiReportGenerator } from './services/kpi';

export interface ReportFiles {
  claims: string;
  transactions: string;
  era?: string;
}

interface RunOptions extends ReportFiles {
  config?: string;
  today?: string;
  out?: string;
}

interface InspectOptions {
  rows: number;
}

const REPORT_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * `YYYY-MM-DD` as a UTC calendar day; no value means the local date today
 */
export function parseReportDate(value?: string, now: Date = new Date()): Date {
  if (value === undefined) {
    return new Date(Date.UTC(now.getFullYear(), now.getMonth(), now.getDate()));
  }

  const match = REPORT_DATE.exec(value);
  const date = match ? new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))) : null;
  if (!match || !date || date.getUTCDate() !== Number(match[3]) || date.getUTCMonth() !== Number(match[2]) - 1) {
    throw new ConfigurationError(`Invalid report date: ${value} (expected YYYY-MM-DD)`);
  }
  return date;
}

export function parseRowCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a whole number of rows.');
  }
  return count;
}

class KpiReportRunner {
  private loader = new BatchLoader();
  private pipeline: KpiPipeline;

  constructor(config: ResolvedKpiConfig) {
    this.pipeline = new KpiPipeline(config);
  }

  run(files: ReportFiles, today: Date): KpiReport {
    logger.info(`Building KPI report from ${files.claims} and ${files.transactions}`);

    return this.pipeline.run({
      claimDetail: this.loader.load(files.claims),
      transactions: this.loader.load(files.transactions),
      remittance: files.era ? this.loader.load(files.era) : null,
      today,
    });
  }

  async writeJson(report: KpiReport, outPath: string): Promise<void> {
    await fs.writeFile(outPath, JSON.stringify(report, null, 2) + '\n', 'utf-8');
    logger.info(`Wrote JSON report to ${outPath}`);
  }
}

// CLI Interface
async function main() {
  const program = new Command();

  program
    .name('kpi-report')
    .description('Weekly billing KPI report from claim detail and daily transaction exports')
    .version('1.0.0');

  program
    .command('run')
    .description('Compute every KPI table and print the report')
    .requiredOption('--claims <file>', 'Claim detail export (.csv, .xlsx, .xls)')
    .requiredOption('--transactions <file>', 'Daily transactions export (.csv, .xlsx, .xls)')
    .option('--era <file>', 'Remittance (ERA) ledger export')
    .option('-c, --config <path>', 'Path to configuration file')
    .option('--today <date>', 'Report date (YYYY-MM-DD), defaults to today')
    .option('-o, --out <file>', 'Also write the report as JSON')
    .action(async (options: RunOptions) => {
      const runner = new KpiReportRunner(loadConfig(options.config));
      const report = runner.run(options, parseReportDate(options.today));

      process.stdout.write(KpiReportGenerator.generateTextReport(report));

      if (options.out) {
        await runner.writeJson(report, options.out);
      }

      if (report.issues.some(issue => issue.severity === 'error')) {
        process.exitCode = 2;
      }
    });

  program
    .command('inspect <file>')
    .description('Show the columns and first rows of an export')
    .option('-n, --rows <count>', 'Rows to show', parseRowCount, 5)
    .action((file: string, options: InspectOptions) => {
      const batch = new BatchLoader().load(file);
      const preview = batch.rows.slice(0, options.rows).map(row => batch.columns.map(column => String(row[column] ?? '')));

      console.log(`${batch.name}: ${batch.rows.length} rows`);
      console.log(KpiReportGenerator.formatTable(batch.columns, preview));
    });

  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error) => {
    logger.error(`Application failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
}

export { KpiReportRunner };

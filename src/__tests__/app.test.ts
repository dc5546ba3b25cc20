import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidArgumentError } from 'commander';
import { KpiReportRunner, parseReportDate, parseRowCount } from '../app';
import { resolveConfig } from '../shared/config';
import { ConfigurationError } from '../shared/errors';

describe('parseReportDate', () => {
  it('should parse an ISO calendar date at UTC midnight', () => {
    expect(parseReportDate('2025-03-01')).toEqual(new Date('2025-03-01T00:00:00.000Z'));
  });

  it('should default to the local calendar date', () => {
    expect(parseReportDate(undefined, new Date(2025, 2, 1, 23, 59))).toEqual(new Date('2025-03-01T00:00:00.000Z'));
  });

  it('should reject impossible or malformed dates', () => {
    expect(() => parseReportDate('2025-02-30')).toThrow(ConfigurationError);
    expect(() => parseReportDate('03/01/2025')).toThrow('Invalid report date: 03/01/2025 (expected YYYY-MM-DD)');
  });
});

describe('parseRowCount', () => {
  it('should accept whole numbers', () => {
    expect(parseRowCount('10')).toBe(10);
    expect(parseRowCount('0')).toBe(0);
  });

  it('should reject values that are not a whole number of rows', () => {
    expect(() => parseRowCount('abc')).toThrow(InvalidArgumentError);
    expect(() => parseRowCount('2.5')).toThrow('Expected a whole number of rows.');
    expect(() => parseRowCount('-1')).toThrow(InvalidArgumentError);
  });
});

describe('KpiReportRunner', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kpi-app-'));
    writeFileSync(
      join(dir, 'claims.csv'),
      [
        'Claim No,Rendering Provider,Primary Payer,Start Date of Service,Claim Date,Claim Status Code,Claim Status Group Name,Billed Charge,Payer Charge,Total Payment,Payer Payment,Patient Payment,Contractual Adjustment,Fee Schedule Allowed Fee,Total(Balance)',
        'A1,"Smith, Jane",Medicare,2025-01-15,2025-01-20,PAID,Paid,150.00,120.00,100.00,80.00,20.00,30.00,120.00,20.00',
        'B2,"Smith, Jane",Medicare,2025-02-10,2025-02-12,DEN,Denied,90.00,90.00,0,0,0,0,70.00,90.00',
      ].join('\n')
    );
    writeFileSync(
      join(dir, 'transactions.csv'),
      'Date,Billed Charges,Self Pay Charges,Payer Charges,Total Payments,Patient Payments,Payer Payments,Contractual Adjustments\n' +
        '2025-01-10,1000,50,950,600,100,500,200\n'
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load both exports and run the pipeline', () => {
    const runner = new KpiReportRunner(resolveConfig());

    const report = runner.run(
      { claims: join(dir, 'claims.csv'), transactions: join(dir, 'transactions.csv') },
      new Date('2025-03-01T00:00:00.000Z')
    );

    expect(report.issues).toEqual([]);
    expect(report.datasets.claims.map(claim => claim.claimNo)).toEqual(['A1', 'B2']);
    expect(report.denials).toEqual([{ claimStatusGroupName: 'Denied', count: 1, arBalance: 90 }]);
    expect(report.remittance).toBeNull();
  });

  it('should write the report as JSON', async () => {
    const runner = new KpiReportRunner(resolveConfig());
    const report = runner.run(
      { claims: join(dir, 'claims.csv'), transactions: join(dir, 'transactions.csv') },
      new Date('2025-03-01T00:00:00.000Z')
    );
    const outPath = join(dir, 'report.json');

    await runner.writeJson(report, outPath);

    const written: unknown = JSON.parse(readFileSync(outPath, 'utf-8'));
    expect(written).toMatchObject({ reportDate: '2025-03-01', paymentsByPayer: [{ primaryPayer: 'Medicare', payerPayment: 80 }] });
  });
});

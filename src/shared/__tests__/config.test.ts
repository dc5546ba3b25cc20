import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_CLAIM_COLUMNS, loadConfig, resolveConfig } from '../config';
import { ConfigurationError } from '../errors';

describe('resolveConfig', () => {
  it('should fill every default', () => {
    const config = resolveConfig();

    expect(config.excludedProvider).toBeNull();
    expect(config.dosCutoff).toEqual(new Date('2024-11-01T00:00:00.000Z'));
    expect(config.minorPayerClaimThreshold).toBe(10);
    expect(config.minorPaymentQuantile).toBe(0.1);
    expect(config.minorPaymentFloor).toBe(1);
    expect(config.claimColumns).toEqual(DEFAULT_CLAIM_COLUMNS);
    expect(config.transactionColumns.postingStatus).toBe('Posting Status');
  });

  it('should merge column overrides over the defaults', () => {
    const config = resolveConfig({ claimColumns: { claimNo: 'Claim #', serviceDate: ['Service Date'] } });

    expect(config.claimColumns.claimNo).toBe('Claim #');
    expect(config.claimColumns.serviceDate).toEqual(['Service Date']);
    expect(config.claimColumns.primaryPayer).toBe('Primary Payer');
  });

  it('should treat a blank excluded provider as none', () => {
    expect(resolveConfig({ excludedProvider: '   ' }).excludedProvider).toBeNull();
  });

  it('should reject values outside their range', () => {
    expect(() => resolveConfig({ minorPaymentQuantile: 2 })).toThrow(ConfigurationError);
    expect(() => resolveConfig({ minorPaymentQuantile: 2 })).toThrow(
      'Invalid KPI configuration: minorPaymentQuantile: Number must be less than or equal to 1'
    );
  });

  it('should reject a cutoff that is not an ISO date', () => {
    expect(() => resolveConfig({ dosCutoff: 'Nov 2024' })).toThrow(
      'Invalid KPI configuration: dosCutoff: expected YYYY-MM-DD'
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kpi-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return the defaults without a path', () => {
    expect(loadConfig()).toEqual(resolveConfig());
  });

  it('should read a JSON file over the defaults', () => {
    const configPath = join(dir, 'kpi.json');
    writeFileSync(configPath, JSON.stringify({ excludedProvider: 'doe, john', minorPayerClaimThreshold: 5 }));

    const config = loadConfig(configPath);

    expect(config.excludedProvider).toBe('doe, john');
    expect(config.minorPayerClaimThreshold).toBe(5);
    expect(config.minorPaymentFloor).toBe(1);
  });

  it('should wrap unreadable files in a ConfigurationError', () => {
    const configPath = join(dir, 'missing.json');

    let caught: unknown;
    try {
      loadConfig(configPath);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: 'INVALID_CONFIGURATION' });
  });

  it('should reject a JSON document that is not an object', () => {
    const configPath = join(dir, 'list.json');
    writeFileSync(configPath, '[1, 2]');

    expect(() => loadConfig(configPath)).toThrow(`Configuration ${configPath} must contain a JSON object`);
  });
});

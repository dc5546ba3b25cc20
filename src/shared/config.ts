/**
 * KPI configuration
 * Exclusion policy, folding thresholds and column mappings, validated with zod
 */

import { readFileSync } from 'fs';
import { ZodError } from 'zod';
import { logger } from './logger';
import { ConfigurationError } from './errors';
import {
  ClaimColumns,
  KpiConfig,
  KpiConfigInput,
  KpiConfigSchema,
  TransactionColumns,
} from './types';

export const DEFAULT_CLAIM_COLUMNS: ClaimColumns = {
  claimNo: 'Claim No',
  renderingProvider: 'Rendering Provider',
  primaryPayer: 'Primary Payer',
  serviceDate: ['Start Date of Service', 'DOS'],
  claimDate: ['Claim Date'],
  claimStatusCode: 'Claim Status Code',
  claimStatusGroupName: 'Claim Status Group Name',
  billedCharge: 'Billed Charge',
  payerCharge: 'Payer Charge',
  totalPayment: 'Total Payment',
  payerPayment: 'Payer Payment',
  patientPayment: 'Patient Payment',
  contractualAdjustment: 'Contractual Adjustment',
  allowedFee: 'Fee Schedule Allowed Fee',
  balance: 'Total(Balance)',
};

export const DEFAULT_TRANSACTION_COLUMNS: TransactionColumns = {
  date: ['Date'],
  billedCharges: 'Billed Charges',
  selfPayCharges: 'Self Pay Charges',
  payerCharges: 'Payer Charges',
  totalPayments: 'Total Payments',
  patientPayments: 'Patient Payments',
  payerPayments: 'Payer Payments',
  contractualAdjustments: 'Contractual Adjustments',
  postingStatus: 'Posting Status',
};

export interface ResolvedKpiConfig extends Omit<KpiConfig, 'claimColumns' | 'transactionColumns' | 'dosCutoff'> {
  dosCutoff: Date;
  claimColumns: ClaimColumns;
  transactionColumns: TransactionColumns;
}

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: KpiConfigInput | Record<string, unknown> = {}): ResolvedKpiConfig {
  let parsed: KpiConfig;
  try {
    parsed = KpiConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid KPI configuration: ${details.join('; ')}`);
    }
    throw error;
  }

  const dosCutoff = new Date(`${parsed.dosCutoff}T00:00:00.000Z`);
  if (Number.isNaN(dosCutoff.getTime())) {
    throw new ConfigurationError(`Invalid KPI configuration: dosCutoff ${parsed.dosCutoff} is not a calendar date`);
  }

  return {
    ...parsed,
    excludedProvider: parsed.excludedProvider?.trim() ? parsed.excludedProvider : null,
    dosCutoff,
    claimColumns: { ...DEFAULT_CLAIM_COLUMNS, ...parsed.claimColumns },
    transactionColumns: { ...DEFAULT_TRANSACTION_COLUMNS, ...parsed.transactionColumns },
  };
}

/**
 * Load configuration from a JSON file; no path means defaults
 */
export function loadConfig(configPath?: string): ResolvedKpiConfig {
  if (!configPath) {
    return resolveConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to read configuration ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Configuration ${configPath} must contain a JSON object`);
  }

  const config = resolveConfig(raw);
  logger.info(`Loaded KPI configuration from ${configPath}`);
  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

import { z } from 'zod';

// Tabular input as handed over by the file loaders
export type CellValue = string | number | boolean | Date | null;

export type SourceRow = Record<string, CellValue>;

export interface TabularBatch {
  name: string;
  columns: string[];
  rows: SourceRow[];
}

export const GRAND_TOTAL = 'Grand Total';
export const UNKNOWN = 'Unknown';
export const OTHER_MINOR_PAYERS = 'Other minor payers';

export enum AgingBucket {
  ZERO_TO_THIRTY = '0 - 30 Days',
  THIRTY_ONE_TO_SIXTY = '31 - 60 Days',
  SIXTY_ONE_TO_NINETY = '61 - 90 Days',
  NINETY_ONE_TO_ONE_TWENTY = '91 - 120 Days',
  ABOVE_ONE_TWENTY = 'Above 120 Days',
}

export const AGING_BUCKET_ORDER: readonly AgingBucket[] = [
  AgingBucket.ZERO_TO_THIRTY,
  AgingBucket.THIRTY_ONE_TO_SIXTY,
  AgingBucket.SIXTY_ONE_TO_NINETY,
  AgingBucket.NINETY_ONE_TO_ONE_TWENTY,
  AgingBucket.ABOVE_ONE_TWENTY,
];

// Upper (inclusive) day boundary of every bucket except the last
export const AGING_BUCKET_BOUNDARIES: readonly number[] = [30, 60, 90, 120];

// Unknown ages are pushed into the oldest bucket rather than dropped
export const UNKNOWN_AGE_SENTINEL = 999999;

export type IssueSeverity = 'warning' | 'error';

export interface PipelineIssue {
  severity: IssueSeverity;
  source: string;
  message: string;
}

// Column mappings: semantic field -> source column name
export const ClaimColumnsSchema = z.object({
  claimNo: z.string(),
  renderingProvider: z.string(),
  primaryPayer: z.string(),
  serviceDate: z.array(z.string()).min(1),
  claimDate: z.array(z.string()).min(1),
  claimStatusCode: z.string(),
  claimStatusGroupName: z.string(),
  billedCharge: z.string(),
  payerCharge: z.string(),
  totalPayment: z.string(),
  payerPayment: z.string(),
  patientPayment: z.string(),
  contractualAdjustment: z.string(),
  allowedFee: z.string(),
  balance: z.string(),
});

export const TransactionColumnsSchema = z.object({
  date: z.array(z.string()).min(1),
  billedCharges: z.string(),
  selfPayCharges: z.string(),
  payerCharges: z.string(),
  totalPayments: z.string(),
  patientPayments: z.string(),
  payerPayments: z.string(),
  contractualAdjustments: z.string(),
  postingStatus: z.string(),
});

const IsoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const KpiConfigSchema = z.object({
  excludedProvider: z.string().nullable().default(null),
  dosCutoff: IsoDateString.default('2024-11-01'),
  minorPayerClaimThreshold: z.number().int().nonnegative().default(10),
  minorPaymentQuantile: z.number().min(0).max(1).default(0.1),
  minorPaymentFloor: z.number().default(1.0),
  claimColumns: ClaimColumnsSchema.partial().default({}),
  transactionColumns: TransactionColumnsSchema.partial().default({}),
});

export type ClaimColumns = z.infer<typeof ClaimColumnsSchema>;
export type TransactionColumns = z.infer<typeof TransactionColumnsSchema>;
export type KpiConfigInput = z.input<typeof KpiConfigSchema>;
export type KpiConfig = z.output<typeof KpiConfigSchema>;

/**
 * Denials Summarizer Interfaces and Types
 */

export interface DenialSummaryRow {
  claimStatusGroupName: string;
  count: number;
  arBalance: number;
}

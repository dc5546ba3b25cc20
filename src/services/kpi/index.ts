/**
 * KPI Pipeline Module
 */

export { KpiPipeline } from './service';
export { KpiCalculator } from './calculator';
export { KpiReportGenerator } from './reporting';
export * from './interfaces';

/**
 * Pipeline error types
 * Fatal conditions carry a stable code so callers can branch without parsing messages
 */

export type KpiErrorCode =
  | 'MISSING_INPUT'
  | 'MISSING_REMITTANCE_SCHEMA'
  | 'INVALID_CONFIGURATION'
  | 'UNSUPPORTED_FILE';

export class KpiPipelineError extends Error {
  constructor(
    public readonly code: KpiErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class MissingInputError extends KpiPipelineError {
  constructor(public readonly inputs: string[]) {
    super('MISSING_INPUT', `Required input batch missing: ${inputs.join(', ')}`);
  }
}

export class MissingRemittanceSchemaError extends KpiPipelineError {
  constructor(public readonly missingFields: string[]) {
    super(
      'MISSING_REMITTANCE_SCHEMA',
      `Remittance batch is missing required fields: ${missingFields.join(', ')}`
    );
  }
}

export class ConfigurationError extends KpiPipelineError {
  constructor(message: string) {
    super('INVALID_CONFIGURATION', message);
  }
}

export class UnsupportedFileError extends KpiPipelineError {
  constructor(filePath: string) {
    super('UNSUPPORTED_FILE', `Unsupported file type: ${filePath} (expected .csv, .xlsx or .xls)`);
  }
}

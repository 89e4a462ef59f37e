/**
 * Maintenance Errors
 *
 * Error taxonomy for a maintenance run. The code decides how far a failure
 * reaches:
 *   - CONFIGURATION_DEFECT        step skipped, run continues
 *   - EXECUTION_ERROR             step/table failed, run continues
 *   - DUMP_FAILURE                remaining steps of the table skipped
 *   - UPLOAD_FAILURE              logged only, local dump kept
 *   - DATABASE_SELECTION_FAILURE  tables of the group skipped
 *   - CONNECTION_FAILURE          whole run fails
 */

export type MaintenanceErrorCode =
  | 'CONFIGURATION_DEFECT'
  | 'EXECUTION_ERROR'
  | 'DUMP_FAILURE'
  | 'UPLOAD_FAILURE'
  | 'DATABASE_SELECTION_FAILURE'
  | 'CONNECTION_FAILURE';

export class MaintenanceError extends Error {
  constructor(
    message: string,
    readonly code: MaintenanceErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'MaintenanceError';
  }
}

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends MaintenanceError {
  constructor(
    message: string,
    readonly issues: ConfigurationIssue[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, 'CONFIGURATION_DEFECT', options);
    this.name = 'ConfigurationError';
  }
}

export class ExecutionError extends MaintenanceError {
  constructor(
    message: string,
    readonly statement: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'EXECUTION_ERROR', options);
    this.name = 'ExecutionError';
  }
}

export class DumpError extends MaintenanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DUMP_FAILURE', options);
    this.name = 'DumpError';
  }
}

export class UploadError extends MaintenanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'UPLOAD_FAILURE', options);
    this.name = 'UploadError';
  }
}

export class DatabaseSelectionError extends MaintenanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DATABASE_SELECTION_FAILURE', options);
    this.name = 'DatabaseSelectionError';
  }
}

export class ConnectionError extends MaintenanceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONNECTION_FAILURE', options);
    this.name = 'ConnectionError';
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

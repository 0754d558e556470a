import { AppMode } from './constants.js';

export type ValidationStage =
  | 'size_check'
  | 'content_check'
  | 'yaml_parsing'
  | 'version_check'
  | 'schema_validation'
  | 'workflow_validation'
  | 'node_schema_validation'
  | 'frontend_compatibility'
  | 'variable_validation'
  | 'variable_reference_validation'
  | 'dependency_validation'
  | 'unexpected_error';

export interface ValidationIssue {
  readonly stage: ValidationStage;
  /** Machine-readable and stable across releases. */
  readonly code: string;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

export interface ValidationInfo {
  dsl_version?: string;
  app_mode?: AppMode;
  node_count?: number;
  edge_count?: number;
}

export interface ValidationResult {
  success: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  info: ValidationInfo;
}

/**
 * Accumulates issues across every validation stage of a single call.
 * A fresh collector is created per call and discarded once the result is built.
 */
export class ValidationCollector {
  private readonly errors: ValidationIssue[] = [];
  private readonly warnings: ValidationIssue[] = [];
  readonly info: ValidationInfo = {};

  error(stage: ValidationStage, code: string, message: string, details?: Record<string, unknown>): void {
    this.errors.push(createIssue(stage, code, message, details));
  }

  warning(stage: ValidationStage, code: string, message: string, details?: Record<string, unknown>): void {
    this.warnings.push(createIssue(stage, code, message, details));
  }

  get errorCount(): number {
    return this.errors.length;
  }

  toResult(): ValidationResult {
    return {
      success: this.errors.length === 0,
      errors: [...this.errors],
      warnings: [...this.warnings],
      info: { ...this.info },
    };
  }
}

function createIssue(
  stage: ValidationStage,
  code: string,
  message: string,
  details?: Record<string, unknown>,
): ValidationIssue {
  return details === undefined
    ? Object.freeze({ stage, code, message })
    : Object.freeze({ stage, code, message, details: Object.freeze({ ...details }) });
}

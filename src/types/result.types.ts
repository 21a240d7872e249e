// Result types for service and adapter responses

import { BusinessMetrics, RawShipmentRow, Shipment } from './domain.types';

/**
 * Represents the outcome of an operation that may succeed or fail.
 * Discriminated union prevents invalid states.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T; readonly message: string }        // Success with data
  | { readonly success: true; readonly message: string }                          // Success without data (not found / nothing to return)
  | { readonly success: false; readonly message: string };                        // Failure

export type ValidationTier = 'shape' | 'business_rule';

export type BusinessRuleName =
  | 'DUPLICATE_GUID'
  | 'COST_OUT_OF_RANGE'
  | 'REVENUE_OUT_OF_RANGE'
  | 'DEGENERATE_ROUTE'
  | 'SHIPPING_DATE_OUT_OF_RANGE'
  | 'DURATION_OUT_OF_RANGE'
  | 'PROFIT_MARGIN_OUT_OF_RANGE';

interface RowErrorBase {
  rowNumber: number;               // 1-based position of the data row in the batch
  guid?: string;
  message: string;
  rawData: RawShipmentRow;
}

/**
 * Row-local error. Never aborts a run; collected in input row order.
 */
export type RowError =
  | (RowErrorBase & { errorType: 'MALFORMED_ROW'; field: string })
  | (RowErrorBase & { errorType: 'VALIDATION_ERROR'; tier: Extract<ValidationTier, 'shape'> })
  | (RowErrorBase & { errorType: 'VALIDATION_ERROR'; tier: Extract<ValidationTier, 'business_rule'>; rule: BusinessRuleName });

export interface ValidationResult {
  valid: Shipment[];
  errors: RowError[];
}

export interface AcceptedRow {
  rowNumber: number;
  row: RawShipmentRow;
}

export interface ShapeValidationResult {
  accepted: AcceptedRow[];
  errors: RowError[];
}

export type PipelineStage = 'extract' | 'load';

export interface FatalPipelineError {
  stage: PipelineStage;
  errorType: 'EXTRACTION_ERROR' | 'LOAD_ERROR';
  message: string;
}

export interface PipelineRun {
  batchId: string;
  source: string;
  destination: string;
  success: boolean;
  dryRun: boolean;
  totalRows: number;
  validCount: number;
  errorCount: number;              // number of error entries
  rejectedCount: number;           // distinct rejected rows
  errors: RowError[];
  objectKeys: string[];
  businessMetrics: BusinessMetrics;
  startedAt: string;               // ISO 8601
  finishedAt: string;              // ISO 8601
  durationMs: number;
  fatalError?: FatalPipelineError;
}

// ============================================================================
// Type Guards - Shared utility functions for type narrowing
// ============================================================================

/**
 * Type guard to check if Result has data (success with data case).
 */
export function isSuccess<T>(result: Result<T>): result is { readonly success: true; readonly data: T; readonly message: string } {
  return result.success && 'data' in result;
}

/**
 * Type guard to check if Result is not found (success without data case).
 */
export function isNotFound<T>(result: Result<T>): result is { readonly success: true; readonly message: string } {
  return result.success && !('data' in result);
}

/**
 * Type guard to check if Result is a failure.
 */
export function isFailure<T>(result: Result<T>): result is { readonly success: false; readonly message: string } {
  return !result.success;
}

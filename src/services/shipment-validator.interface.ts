import { RawShipmentRow, Shipment } from '../types/domain.types';
import { ShapeValidationResult, ValidationResult } from '../types/result.types';

export interface ValidationRules {
  maxAmount: number;
  earliestShippingDate: string;    // YYYY-MM-DD, inclusive
  latestShippingDate: string;      // YYYY-MM-DD, inclusive
  maxShippingDurationDays: number;
  minProfitMargin: number;         // percent
}

export const DEFAULT_VALIDATION_RULES: ValidationRules = {
  maxAmount: 10_000_000,
  earliestShippingDate: '2020-01-01',
  latestShippingDate: '2030-12-31',
  maxShippingDurationDays: 730,
  minProfitMargin: -1000
};

/** Where a shipment came from, for error reporting. */
export interface RowSource {
  rowNumber: number;
  rawData: RawShipmentRow;
}

/**
 * Two-tier validation: shape checks over raw rows before construction,
 * business rules over built shipments.
 */
export interface IShipmentValidator {
  validateBatchShape(rows: readonly RawShipmentRow[]): ShapeValidationResult;

  /**
   * @param sources - parallel to `shipments`; when omitted, row numbers are
   * positions in `shipments` and raw data is rebuilt from each shipment.
   */
  validateShipments(shipments: readonly Shipment[], sources?: readonly RowSource[]): ValidationResult;
}

import { RawShipmentRow } from '../../types/domain.types';
import { AcceptedRow } from '../../types/result.types';

export interface RejectedRow {
  rowNumber: number;
  reasons: string[];
  rawData: RawShipmentRow;
}

export interface SchemaCheckResult {
  accepted: AcceptedRow[];
  rejected: RejectedRow[];
}

/**
 * Structural check over raw rows, run before any Shipment is built.
 * Row numbers are 1-based positions in the given batch.
 */
export interface ISchemaValidator {
  check(rows: readonly RawShipmentRow[]): SchemaCheckResult;
}

import { RawShipmentRow } from '../../types/domain.types';
import { Result } from '../../types/result.types';

/**
 * Reader for raw shipment rows.
 */
export interface IShipmentSource {
  /**
   * Reads every row of the source.
   * @returns Result with success=true and the rows (possibly empty), success=false when the source
   * cannot be read or is not tabular
   */
  extractShipments(source: string): Promise<Result<RawShipmentRow[]>>;
}

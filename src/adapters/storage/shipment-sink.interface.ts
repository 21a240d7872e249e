import { Shipment, ShipmentFileFormat } from '../../types/domain.types';
import { Result } from '../../types/result.types';

export interface SaveShipmentsOptions {
  batchId: string;
  prefix: string;
  formats: readonly ShipmentFileFormat[];
}

/**
 * Destination for validated shipments.
 */
export interface IShipmentSink {
  /**
   * @returns Result with the keys written, success=false when any write is rejected
   */
  saveShipments(shipments: readonly Shipment[], destination: string, options: SaveShipmentsOptions): Promise<Result<string[]>>;
}

import { Shipment, ShipmentFileFormat } from '../types/domain.types';
import { PipelineRun, Result, RowError } from '../types/result.types';

export interface ProcessShipmentsOptions {
  batchId?: string;
  prefix?: string;
  formats?: readonly ShipmentFileFormat[];
  dryRun?: boolean;       // extract, derive and validate without writing
}

export interface ValidatedBatch {
  totalRows: number;
  shipments: Shipment[];
  errors: RowError[];
}

export interface IShipmentEtlService {
  processShipments(source: string, destination: string, options?: ProcessShipmentsOptions): Promise<PipelineRun>;

  /** Extract, shape-check, derive and business-validate without loading or reporting. */
  extractValidShipments(source: string): Promise<Result<ValidatedBatch>>;
}

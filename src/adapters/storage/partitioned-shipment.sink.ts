import { stringify } from 'csv-stringify';
import { inject, injectable } from 'tsyringe';
import { Shipment, ShipmentFileFormat, ShipmentRecord } from '../../types/domain.types';
import { isFailure, Result } from '../../types/result.types';
import { buildPartitionKey } from '../../utils/partition-key.util';
import { toShipmentRecord } from '../../utils/shipment.util';
import { IObjectStorage } from './object-storage.interface';
import { encodeParquet } from './parquet-shipment.encoder';
import { IShipmentSink, SaveShipmentsOptions } from './shipment-sink.interface';

export const SHIPMENT_RECORD_COLUMNS: (keyof ShipmentRecord)[] = [
  'guid',
  'origin',
  'destination',
  'cost',
  'revenue',
  'shipping_date',
  'delivery_date',
  'profit',
  'profit_margin',
  'shipping_duration_days',
  'is_profitable',
  'is_high_margin',
  'is_delayed',
  'processed_at',
  'year',
  'month',
  'quarter'
];

const CONTENT_TYPES: Record<ShipmentFileFormat, string> = {
  csv: 'text/csv',
  jsonl: 'application/x-ndjson',
  parquet: 'application/vnd.apache.parquet'
};

interface Partition {
  year: number;
  month: number;
  shipments: Shipment[];
}

/**
 * Writes one object per (year, month, format), grouped by shipping date.
 * Formats: CSV, JSON Lines and Parquet.
 */
@injectable()
export class PartitionedShipmentSink implements IShipmentSink {
  constructor(@inject('IObjectStorage') private readonly storage: IObjectStorage) {}

  async saveShipments(
    shipments: readonly Shipment[],
    destination: string,
    options: SaveShipmentsOptions
  ): Promise<Result<string[]>> {
    if (shipments.length === 0) {
      return { success: true, data: [], message: 'No shipments to save' };
    }

    const containerResult = await this.storage.createContainer(destination);
    if (isFailure(containerResult)) {
      return { success: false, message: containerResult.message };
    }

    const writtenKeys: string[] = [];
    for (const partition of this.partition(shipments)) {
      const records = partition.shipments.map(toShipmentRecord);

      for (const format of options.formats) {
        const key = buildPartitionKey(options.prefix, partition.year, partition.month, options.batchId, format);
        const body = await this.serialize(records, format);
        const uploadResult = await this.storage.upload(destination, key, body, CONTENT_TYPES[format]);

        if (isFailure(uploadResult)) {
          return {
            success: false,
            message: `Write rejected for ${destination}/${key} after ${writtenKeys.length} object(s): ${uploadResult.message}`
          };
        }
        writtenKeys.push(key);
      }
    }

    return {
      success: true,
      data: writtenKeys,
      message: `Saved ${shipments.length} shipments to ${writtenKeys.length} object(s) in ${destination}`
    };
  }

  private partition(shipments: readonly Shipment[]): Partition[] {
    const partitions = new Map<string, Partition>();

    for (const shipment of shipments) {
      const id = `${shipment.year}-${shipment.month}`;
      const partition = partitions.get(id);
      if (partition) {
        partition.shipments.push(shipment);
      } else {
        partitions.set(id, { year: shipment.year, month: shipment.month, shipments: [shipment] });
      }
    }

    return [...partitions.values()].sort((a, b) => a.year - b.year || a.month - b.month);
  }

  private serialize(records: ShipmentRecord[], format: ShipmentFileFormat): Promise<string | Buffer> {
    if (format === 'parquet') {
      return encodeParquet(records);
    }
    if (format === 'jsonl') {
      return Promise.resolve(records.map(record => JSON.stringify(record)).join('\n') + '\n');
    }

    return new Promise<string>((resolve, reject) => {
      const options = {
        header: true,
        columns: SHIPMENT_RECORD_COLUMNS,
        cast: { boolean: (value: boolean) => (value ? 'true' : 'false') }
      };
      stringify(records, options, (err, output) => {
        if (err) {
          reject(err);
          return;
        }
        resolve(output);
      });
    });
  }
}

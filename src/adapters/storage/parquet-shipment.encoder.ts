import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { ShipmentRecord } from '../../types/domain.types';

export const SHIPMENT_PARQUET_SCHEMA = new ParquetSchema({
  guid: { type: 'UTF8' },
  origin: { type: 'UTF8' },
  destination: { type: 'UTF8' },
  cost: { type: 'DOUBLE' },
  revenue: { type: 'DOUBLE' },
  shipping_date: { type: 'UTF8' },
  delivery_date: { type: 'UTF8' },
  profit: { type: 'DOUBLE' },
  profit_margin: { type: 'DOUBLE' },
  shipping_duration_days: { type: 'INT32' },
  is_profitable: { type: 'BOOLEAN' },
  is_high_margin: { type: 'BOOLEAN' },
  is_delayed: { type: 'BOOLEAN' },
  processed_at: { type: 'UTF8' },
  year: { type: 'INT32' },
  month: { type: 'INT32' },
  quarter: { type: 'INT32' }
});

/**
 * Encodes records as one Parquet file. The writer only targets files,
 * so the bytes go through a scratch directory that is always removed.
 */
export async function encodeParquet(records: readonly ShipmentRecord[]): Promise<Buffer> {
  const dir = await mkdtemp(path.join(tmpdir(), 'shipments-parquet-'));
  try {
    const file = path.join(dir, 'shipments.parquet');
    const writer = await ParquetWriter.openFile(SHIPMENT_PARQUET_SCHEMA, file);
    for (const record of records) {
      await writer.appendRow({ ...record });
    }
    await writer.close();
    return await readFile(file);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

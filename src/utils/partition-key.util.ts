import { ShipmentFileFormat } from '../types/domain.types';

/**
 * Object key for one year/month partition of a batch:
 * `{prefix}/year={YYYY}/month={MM}/{batchId}.{format}`.
 * Month is zero-padded so keys sort chronologically.
 */
export function buildPartitionKey(
  prefix: string,
  year: number,
  month: number,
  batchId: string,
  format: ShipmentFileFormat
): string {
  const cleanPrefix = prefix.replace(/^\/+|\/+$/g, '');
  const partition = `year=${year}/month=${String(month).padStart(2, '0')}/${batchId}.${format}`;
  return cleanPrefix ? `${cleanPrefix}/${partition}` : partition;
}

/** Batch id derived from a timestamp, e.g. `shipments_20240115T103000Z`. */
export function generateBatchId(at: Date): string {
  const stamp = at.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  return `shipments_${stamp}`;
}

import { buildPartitionKey, generateBatchId } from './partition-key.util';

describe('buildPartitionKey', () => {
  it('should build a zero-padded year/month key', () => {
    expect(buildPartitionKey('shipments', 2024, 3, 'batch_1', 'csv')).toBe('shipments/year=2024/month=03/batch_1.csv');
  });

  it('should trim slashes from the prefix', () => {
    expect(buildPartitionKey('/exports/shipments/', 2024, 11, 'b', 'jsonl')).toBe('exports/shipments/year=2024/month=11/b.jsonl');
  });

  it('should omit an empty prefix', () => {
    expect(buildPartitionKey('', 2025, 1, 'b', 'csv')).toBe('year=2025/month=01/b.csv');
  });
});

describe('generateBatchId', () => {
  it('should derive a compact UTC timestamp id', () => {
    expect(generateBatchId(new Date('2024-01-15T10:30:00.000Z'))).toBe('shipments_20240115T103000Z');
  });
});

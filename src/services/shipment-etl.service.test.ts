import 'reflect-metadata';
import { IMetricsCollector } from '../adapters/metrics/metrics-collector.interface';
import { INotificationService } from '../adapters/notification/notification.interface';
import { ZodSchemaValidator } from '../adapters/schema/zod-schema.validator';
import { IShipmentSink } from '../adapters/storage/shipment-sink.interface';
import { IShipmentSource } from '../adapters/source/shipment-source.interface';
import { RawShipmentRow } from '../types/domain.types';
import { isSuccess } from '../types/result.types';
import { ShipmentEtlService } from './shipment-etl.service';
import { DEFAULT_VALIDATION_RULES } from './shipment-validator.interface';
import { ShipmentValidatorService } from './shipment-validator.service';

function row(overrides: RawShipmentRow = {}): RawShipmentRow {
  return {
    guid: 'ABC123',
    origin: 'NY',
    destination: 'LA',
    cost: '1200.50',
    revenue: '1800.00',
    shipping_date: '2024-01-15',
    delivery_date: '2024-01-18',
    ...overrides
  };
}

describe('ShipmentEtlService', () => {
  let service: ShipmentEtlService;
  let mockSource: jest.Mocked<IShipmentSource>;
  let mockSink: jest.Mocked<IShipmentSink>;
  let mockNotifier: jest.Mocked<INotificationService>;
  let mockMetrics: jest.Mocked<IMetricsCollector>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    mockSource = {
      extractShipments: jest.fn()
    };

    mockSink = {
      saveShipments: jest.fn().mockResolvedValue({ success: true, data: ['shipments/year=2024/month=01/batch-1.csv'], message: 'Saved' })
    };

    mockNotifier = {
      notify: jest.fn().mockResolvedValue(true)
    };

    mockMetrics = {
      recordPipelineRun: jest.fn().mockResolvedValue(undefined),
      recordBusinessMetrics: jest.fn().mockResolvedValue(undefined),
      recordDataQuality: jest.fn().mockResolvedValue(undefined),
      getMetricsSummary: jest.fn()
    };

    service = new ShipmentEtlService(
      mockSource,
      mockSink,
      new ShipmentValidatorService(new ZodSchemaValidator(), DEFAULT_VALIDATION_RULES),
      { prefix: 'shipments', formats: ['csv', 'jsonl'] },
      mockNotifier,
      mockMetrics
    );
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  describe('Positive Scenarios', () => {
    // Test: Clean batch is loaded and reported as success
    it('should load every valid shipment and send a success notification', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({
        success: true,
        data: [row(), row({ guid: 'ABC124' })],
        message: 'Extracted 2 rows'
      });

      // Act
      const run = await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });

      // Assert
      expect(run.success).toBe(true);
      expect(run.totalRows).toBe(2);
      expect(run.validCount).toBe(2);
      expect(run.errorCount).toBe(0);
      expect(run.objectKeys).toEqual(['shipments/year=2024/month=01/batch-1.csv']);
      expect(run.fatalError).toBeUndefined();
      expect(run.businessMetrics.totalShipments).toBe(2);

      expect(mockSink.saveShipments).toHaveBeenCalledWith(
        expect.any(Array),
        'bucket',
        { batchId: 'batch-1', prefix: 'shipments', formats: ['csv', 'jsonl'] }
      );
      expect(mockSink.saveShipments.mock.calls[0][0].map(s => s.guid)).toEqual(['ABC123', 'ABC124']);

      expect(mockNotifier.notify).toHaveBeenCalledTimes(1);
      expect(mockNotifier.notify).toHaveBeenCalledWith('success', 'ETL pipeline completed successfully', expect.objectContaining({
        batchId: 'batch-1',
        totalRows: 2,
        validCount: 2,
        errorCount: 0,
        objectCount: 1
      }));
    });

    // Test: Derived fields reach the sink
    it('should hand derived shipments to the sink', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });

      // Act
      await service.processShipments('data.csv', 'bucket');

      // Assert
      const [saved] = mockSink.saveShipments.mock.calls[0][0];
      expect(saved.profit).toBe(599.5);
      expect(saved.profitMargin).toBeCloseTo(33.31, 2);
      expect(saved.shippingDurationDays).toBe(3);
      expect(saved.isHighMargin).toBe(true);
      expect(saved.isDelayed).toBe(false);
    });

    // Test: Metrics hook receives the run, business and quality figures
    it('should record pipeline, business and data quality metrics', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });

      // Act
      await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });

      // Assert
      expect(mockMetrics.recordPipelineRun).toHaveBeenCalledWith({
        batchId: 'batch-1',
        totalRows: 1,
        validCount: 1,
        errorCount: 0,
        durationMs: expect.any(Number),
        success: true
      });
      expect(mockMetrics.recordBusinessMetrics).toHaveBeenCalledWith(expect.objectContaining({ totalShipments: 1, totalProfit: 599.5 }));
      expect(mockMetrics.recordDataQuality).toHaveBeenCalledWith({
        totalRecords: 1,
        validRecords: 1,
        invalidRecords: 0,
        errorCounts: {}
      });
    });

    // Test: Default batch id
    it('should generate a batch id when none is given', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.batchId).toMatch(/^shipments_\d{8}T\d{6}Z$/);
    });

    // Test: Dry run validates without writing
    it('should skip the load on a dry run', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket', { dryRun: true });

      // Assert
      expect(run.success).toBe(true);
      expect(run.dryRun).toBe(true);
      expect(run.validCount).toBe(1);
      expect(run.objectKeys).toEqual([]);
      expect(mockSink.saveShipments).not.toHaveBeenCalled();
    });

    // Test: Re-running the same input gives the same outcome and the same writes
    it('should produce the same result when re-run with the same batch id', async () => {
      // Arrange
      jest.useFakeTimers({ now: new Date('2024-02-01T00:00:00.000Z') });
      mockSource.extractShipments.mockResolvedValue({
        success: true,
        data: [row(), row({ guid: 'ABC124', cost: 'oops' })],
        message: 'ok'
      });

      // Act
      const first = await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });
      const second = await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });

      // Assert
      expect(second).toEqual(first);
      expect(mockSink.saveShipments.mock.calls[1]).toEqual(mockSink.saveShipments.mock.calls[0]);
    });

    // Test: Hooks are optional
    it('should run without notification and metrics hooks', async () => {
      // Arrange
      const bare = new ShipmentEtlService(
        mockSource,
        mockSink,
        new ShipmentValidatorService(new ZodSchemaValidator(), DEFAULT_VALIDATION_RULES),
        { prefix: 'shipments', formats: ['jsonl'] }
      );
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });

      // Act
      const run = await bare.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(true);
      expect(mockSink.saveShipments).toHaveBeenCalledWith(expect.any(Array), 'bucket', expect.objectContaining({ formats: ['jsonl'] }));
      expect(mockNotifier.notify).not.toHaveBeenCalled();
    });
  });

  describe('Partial Success', () => {
    // Test: Rejected rows are reported and the rest is loaded
    it('should merge shape, construction and rule errors in row order', async () => {
      // Arrange
      const rows = [
        row(),
        row({ guid: 'ABC124', cost: 'abc' }),
        row({ guid: 'ABC125', shipping_date: '2024-01-15', delivery_date: '2024-01-10' }),
        row()
      ];
      mockSource.extractShipments.mockResolvedValue({ success: true, data: rows, message: 'ok' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });

      // Assert
      expect(run.success).toBe(true);
      expect(run.totalRows).toBe(4);
      expect(run.validCount).toBe(1);
      expect(run.errorCount).toBe(3);
      expect(run.rejectedCount).toBe(3);
      expect(run.validCount + run.rejectedCount).toBe(run.totalRows);
      expect(run.errors).toEqual([
        {
          rowNumber: 2,
          guid: 'ABC124',
          errorType: 'VALIDATION_ERROR',
          tier: 'shape',
          message: 'Schema validation failed: cost: must be a number',
          rawData: rows[1]
        },
        {
          rowNumber: 3,
          guid: 'ABC125',
          errorType: 'MALFORMED_ROW',
          field: 'delivery_date',
          message: 'delivery_date 2024-01-10 is before shipping_date 2024-01-15',
          rawData: rows[2]
        },
        {
          rowNumber: 4,
          guid: 'ABC123',
          errorType: 'VALIDATION_ERROR',
          tier: 'business_rule',
          rule: 'DUPLICATE_GUID',
          message: 'Duplicate guid ABC123 (first seen in row 1)',
          rawData: rows[3]
        }
      ]);
      expect(mockSink.saveShipments.mock.calls[0][0]).toHaveLength(1);
      expect(mockNotifier.notify).toHaveBeenCalledWith('warning', 'ETL pipeline completed with 3 rejected row(s)', expect.objectContaining({ errorCount: 3 }));
      expect(mockMetrics.recordDataQuality).toHaveBeenCalledWith({
        totalRecords: 4,
        validRecords: 1,
        invalidRecords: 3,
        errorCounts: { shape: 1, malformed_row: 1, DUPLICATE_GUID: 1 }
      });
    });

    // Test: Several rule failures on one row count once as a rejected row
    it('should count a row with several errors once in rejectedCount', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({
        success: true,
        data: [row({ origin: 'LA', revenue: '20000000' }), row({ guid: 'ABC124' })],
        message: 'ok'
      });

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.errorCount).toBe(2);
      expect(run.rejectedCount).toBe(1);
      expect(run.validCount).toBe(1);
    });

    // Test: Duplicates are only tracked among built shipments
    it('should load a guid whose earlier row was rejected before construction', async () => {
      // Arrange
      const rows = [row({ cost: 'abc' }), row()];
      mockSource.extractShipments.mockResolvedValue({ success: true, data: rows, message: 'ok' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.validCount).toBe(1);
      expect(run.errors).toHaveLength(1);
      expect(run.errors[0]).toMatchObject({ rowNumber: 1, guid: 'ABC123', errorType: 'VALIDATION_ERROR', tier: 'shape' });
      expect(mockSink.saveShipments.mock.calls[0][0].map(s => s.guid)).toEqual(['ABC123']);
    });

    // Test: Nothing valid means nothing written, still a successful run
    it('should write nothing and warn when every row is rejected', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({
        success: true,
        data: [row({ cost: '' }), row({ guid: 'ABC124', revenue: 'x' })],
        message: 'ok'
      });

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(true);
      expect(run.validCount).toBe(0);
      expect(run.objectKeys).toEqual([]);
      expect(mockSink.saveShipments).not.toHaveBeenCalled();
      expect(mockMetrics.recordBusinessMetrics).not.toHaveBeenCalled();
      expect(mockNotifier.notify).toHaveBeenCalledWith('warning', 'ETL pipeline completed with 2 rejected row(s)', expect.any(Object));
    });

    // Test: Empty source
    it('should succeed on an empty source without writing', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [], message: 'ok' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(true);
      expect(run.totalRows).toBe(0);
      expect(mockSink.saveShipments).not.toHaveBeenCalled();
      expect(mockNotifier.notify).toHaveBeenCalledWith('success', 'ETL pipeline completed successfully', expect.any(Object));
    });
  });

  describe('Fatal Failures', () => {
    // Test: Source failure result
    it('should fail the run when extraction returns a failure', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: false, message: 'Failed to read shipment source data.csv: ENOENT' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });

      // Assert
      expect(run.success).toBe(false);
      expect(run.totalRows).toBe(0);
      expect(run.fatalError).toEqual({
        stage: 'extract',
        errorType: 'EXTRACTION_ERROR',
        message: 'Failed to read shipment source data.csv: ENOENT'
      });
      expect(mockSink.saveShipments).not.toHaveBeenCalled();
      expect(mockNotifier.notify).toHaveBeenCalledTimes(1);
      expect(mockNotifier.notify).toHaveBeenCalledWith('error', 'ETL pipeline failed during extract', {
        batchId: 'batch-1',
        source: 'data.csv',
        destination: 'bucket',
        error: 'Failed to read shipment source data.csv: ENOENT'
      });
    });

    // Test: Source throws
    it('should turn a thrown extraction error into a fatal error', async () => {
      // Arrange
      mockSource.extractShipments.mockRejectedValue(new Error('boom'));

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(false);
      expect(run.fatalError?.message).toBe('Extraction failed for data.csv: boom');
    });

    // Test: Unexpected errors after extraction are not reported as extraction failures
    it('should let an unexpected validation error propagate', async () => {
      // Arrange
      const validator = new ShipmentValidatorService(new ZodSchemaValidator(), DEFAULT_VALIDATION_RULES);
      jest.spyOn(validator, 'validateShipments').mockImplementation(() => {
        throw new Error('rule table unavailable');
      });
      const failing = new ShipmentEtlService(
        mockSource,
        mockSink,
        validator,
        { prefix: 'shipments', formats: ['csv'] },
        mockNotifier,
        mockMetrics
      );
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });

      // Act & Assert
      await expect(failing.processShipments('data.csv', 'bucket')).rejects.toThrow('rule table unavailable');
      await expect(failing.extractValidShipments('data.csv')).rejects.toThrow('rule table unavailable');
      expect(mockSink.saveShipments).not.toHaveBeenCalled();
      expect(mockNotifier.notify).not.toHaveBeenCalled();
    });

    // Test: Load failure after a fully valid batch
    it('should fail the run and send exactly one error notification when the load fails', async () => {
      // Arrange
      const rows = Array.from({ length: 10 }, (_, i) => row({ guid: `SHP${i + 1}` }));
      mockSource.extractShipments.mockResolvedValue({ success: true, data: rows, message: 'ok' });
      mockSink.saveShipments.mockResolvedValue({ success: false, message: 'Write rejected for bucket/key after 0 object(s): denied' });

      // Act
      const run = await service.processShipments('data.csv', 'bucket', { batchId: 'batch-1' });

      // Assert
      expect(run.success).toBe(false);
      expect(run.totalRows).toBe(10);
      expect(run.validCount).toBe(10);
      expect(run.errorCount).toBe(0);
      expect(run.objectKeys).toEqual([]);
      expect(run.fatalError).toEqual({
        stage: 'load',
        errorType: 'LOAD_ERROR',
        message: 'Load failed for bucket: Write rejected for bucket/key after 0 object(s): denied'
      });
      expect(mockNotifier.notify).toHaveBeenCalledTimes(1);
      expect(mockNotifier.notify).toHaveBeenCalledWith('error', 'ETL pipeline failed during load', expect.any(Object));
      expect(mockNotifier.notify).not.toHaveBeenCalledWith('success', expect.anything(), expect.anything());
      expect(mockMetrics.recordPipelineRun).toHaveBeenCalledWith(expect.objectContaining({ success: false, validCount: 10 }));
    });

    // Test: Sink throws
    it('should turn a thrown sink error into a load error', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });
      mockSink.saveShipments.mockRejectedValue(new Error('disk full'));

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(false);
      expect(run.fatalError).toEqual({ stage: 'load', errorType: 'LOAD_ERROR', message: 'Load failed for bucket: disk full' });
    });
  });

  describe('Hook Failures', () => {
    // Test: Hooks never change the outcome
    it('should keep a successful run when notification and metrics hooks fail', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });
      mockNotifier.notify.mockRejectedValue(new Error('smtp down'));
      mockMetrics.recordPipelineRun.mockRejectedValue(new Error('metrics down'));

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(true);
      expect(run.validCount).toBe(1);
      expect(console.warn).toHaveBeenCalledWith('[ETL] Metrics recording failed:', 'metrics down');
      expect(console.warn).toHaveBeenCalledWith('[ETL] success notification failed:', 'smtp down');
    });

    // Test: Undelivered notification is only logged
    it('should log an undelivered notification', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: true, data: [row()], message: 'ok' });
      mockNotifier.notify.mockResolvedValue(false);

      // Act
      const run = await service.processShipments('data.csv', 'bucket');

      // Assert
      expect(run.success).toBe(true);
      expect(console.warn).toHaveBeenCalledWith('[ETL] success notification was not delivered');
    });
  });

  describe('extractValidShipments', () => {
    // Test: Validates without loading or reporting
    it('should return the valid shipments without loading', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({
        success: true,
        data: [row(), row({ guid: 'ABC124', origin: '' })],
        message: 'ok'
      });

      // Act
      const result = await service.extractValidShipments('data.csv');

      // Assert
      expect(result.success).toBe(true);
      expect(result.message).toBe('1 of 2 rows passed validation');
      expect(isSuccess(result) && result.data.shipments.map(s => s.guid)).toEqual(['ABC123']);
      expect(isSuccess(result) && result.data.errors[0].rowNumber).toBe(2);
      expect(mockSink.saveShipments).not.toHaveBeenCalled();
      expect(mockNotifier.notify).not.toHaveBeenCalled();
      expect(mockMetrics.recordPipelineRun).not.toHaveBeenCalled();
    });

    // Test: Extraction failures come back as failure results
    it('should return a failure result when extraction fails', async () => {
      // Arrange
      mockSource.extractShipments.mockResolvedValue({ success: false, message: 'Failed to read shipment source missing.csv: ENOENT' });

      // Act
      const result = await service.extractValidShipments('missing.csv');

      // Assert
      expect(result).toEqual({ success: false, message: 'Failed to read shipment source missing.csv: ENOENT' });
    });
  });
});

import { IMetricsCollector } from '../adapters/metrics/metrics-collector.interface';
import { INotificationService, NotificationDetails, NotificationLevel } from '../adapters/notification/notification.interface';
import { IShipmentSink } from '../adapters/storage/shipment-sink.interface';
import { IShipmentSource } from '../adapters/source/shipment-source.interface';
import { RawShipmentRow, Shipment, ShipmentFileFormat } from '../types/domain.types';
import { ExtractionError, FatalPipelineFailure, LoadError, MalformedRowError, toError } from '../types/errors';
import { isFailure, isSuccess, PipelineRun, Result, RowError } from '../types/result.types';
import { calculateBusinessMetrics } from '../utils/business-metrics.util';
import { generateBatchId } from '../utils/partition-key.util';
import { buildShipment } from '../utils/shipment.util';
import { IShipmentEtlService, ProcessShipmentsOptions, ValidatedBatch } from './shipment-etl.interface';
import { IShipmentValidator, RowSource } from './shipment-validator.interface';

export interface EtlDefaults {
  prefix: string;
  formats: readonly ShipmentFileFormat[];
}

interface RunContext {
  batchId: string;
  source: string;
  destination: string;
  dryRun: boolean;
  startedAt: Date;
}

/**
 * Runs one batch through extract -> shape check -> derive -> business rules -> load,
 * then reports through the optional metrics and notification hooks.
 */
export class ShipmentEtlService implements IShipmentEtlService {
  constructor(
    private readonly source: IShipmentSource,
    private readonly sink: IShipmentSink,
    private readonly validator: IShipmentValidator,
    private readonly defaults: EtlDefaults,
    private readonly notificationService?: INotificationService,
    private readonly metricsCollector?: IMetricsCollector
  ) {}

  async processShipments(
    source: string,
    destination: string,
    options: ProcessShipmentsOptions = {}
  ): Promise<PipelineRun> {
    const startedAt = new Date();
    const context: RunContext = {
      batchId: options.batchId ?? generateBatchId(startedAt),
      source,
      destination,
      dryRun: options.dryRun ?? false,
      startedAt
    };
    console.log(`[ETL] Starting batch ${context.batchId}: ${source} -> ${destination}`);

    let rows: RawShipmentRow[];
    try {
      rows = await this.extract(source);
    } catch (error) {
      return this.finishFailed(context, this.asFatal(error, 'extract'));
    }

    const batch = this.transform(rows, startedAt);
    console.log(`[ETL] Validation: ${batch.shipments.length} valid, ${batch.errors.length} error(s) across ${batch.totalRows} rows`);

    let objectKeys: string[] = [];
    if (context.dryRun) {
      console.log('[ETL] Dry run - skipping load');
    } else {
      try {
        objectKeys = await this.load(batch.shipments, destination, context.batchId, options);
      } catch (error) {
        return this.finishFailed(context, this.asFatal(error, 'load'), batch);
      }
    }

    const run = this.buildRun(context, batch, objectKeys, true);
    console.log(`[ETL] Batch ${run.batchId} completed in ${run.durationMs}ms (${run.validCount}/${run.totalRows} rows loaded)`);
    await this.report(run, batch.shipments);
    return run;
  }

  async extractValidShipments(source: string): Promise<Result<ValidatedBatch>> {
    let rows: RawShipmentRow[];
    try {
      rows = await this.extract(source);
    } catch (error) {
      return { success: false, message: toError(error).message };
    }

    const batch = this.transform(rows, new Date());
    return {
      success: true,
      data: batch,
      message: `${batch.shipments.length} of ${batch.totalRows} rows passed validation`
    };
  }

  private async extract(source: string): Promise<RawShipmentRow[]> {
    let result: Result<RawShipmentRow[]>;
    try {
      result = await this.source.extractShipments(source);
    } catch (error) {
      throw new ExtractionError(`Extraction failed for ${source}: ${toError(error).message}`, toError(error));
    }

    if (isFailure(result)) {
      throw new ExtractionError(result.message);
    }
    const rows = isSuccess(result) ? result.data : [];
    console.log(`[ETL] Extracted ${rows.length} raw rows from ${source}`);
    return rows;
  }

  private transform(rows: RawShipmentRow[], processedAt: Date): ValidatedBatch {
    const shape = this.validator.validateBatchShape(rows);

    const shipments: Shipment[] = [];
    const sources: RowSource[] = [];
    const derivationErrors: RowError[] = [];

    for (const { rowNumber, row } of shape.accepted) {
      try {
        shipments.push(buildShipment(row, processedAt));
        sources.push({ rowNumber, rawData: row });
      } catch (error) {
        if (!(error instanceof MalformedRowError)) throw error;
        derivationErrors.push({
          rowNumber,
          guid: typeof row.guid === 'string' ? row.guid.trim().toUpperCase() : undefined,
          errorType: 'MALFORMED_ROW',
          field: error.field,
          message: error.message,
          rawData: row
        });
      }
    }

    const business = this.validator.validateShipments(shipments, sources);
    const errors = [...shape.errors, ...derivationErrors, ...business.errors]
      .sort((a, b) => a.rowNumber - b.rowNumber);

    return { totalRows: rows.length, shipments: business.valid, errors };
  }

  private async load(
    shipments: Shipment[],
    destination: string,
    batchId: string,
    options: ProcessShipmentsOptions
  ): Promise<string[]> {
    if (shipments.length === 0) {
      console.warn('[ETL] No valid shipments to load');
      return [];
    }

    let result: Result<string[]>;
    try {
      result = await this.sink.saveShipments(shipments, destination, {
        batchId,
        prefix: options.prefix ?? this.defaults.prefix,
        formats: options.formats ?? this.defaults.formats
      });
    } catch (error) {
      throw new LoadError(`Load failed for ${destination}: ${toError(error).message}`, toError(error));
    }

    if (isFailure(result)) {
      throw new LoadError(`Load failed for ${destination}: ${result.message}`);
    }
    const keys = isSuccess(result) ? result.data : [];
    console.log(`[ETL] Loaded ${shipments.length} shipments into ${keys.length} object(s)`);
    return keys;
  }

  private asFatal(error: unknown, stage: 'extract' | 'load'): FatalPipelineFailure {
    if (error instanceof FatalPipelineFailure) return error;
    const cause = toError(error);
    return stage === 'extract'
      ? new ExtractionError(`Extraction failed: ${cause.message}`, cause)
      : new LoadError(`Load failed: ${cause.message}`, cause);
  }

  private async finishFailed(
    context: RunContext,
    failure: FatalPipelineFailure,
    batch?: ValidatedBatch
  ): Promise<PipelineRun> {
    const emptyBatch: ValidatedBatch = { totalRows: 0, shipments: [], errors: [] };
    const run: PipelineRun = {
      ...this.buildRun(context, batch ?? emptyBatch, [], false),
      fatalError: {
        stage: failure.stage,
        errorType: failure.errorType,
        message: failure.message
      }
    };

    console.error(`[ETL] Batch ${run.batchId} failed during ${failure.stage}: ${failure.message}`);
    await this.report(run, batch?.shipments ?? []);
    return run;
  }

  private buildRun(context: RunContext, batch: ValidatedBatch, objectKeys: string[], success: boolean): PipelineRun {
    const finishedAt = new Date();
    return {
      batchId: context.batchId,
      source: context.source,
      destination: context.destination,
      success,
      dryRun: context.dryRun,
      totalRows: batch.totalRows,
      validCount: batch.shipments.length,
      errorCount: batch.errors.length,
      rejectedCount: new Set(batch.errors.map(error => error.rowNumber)).size,
      errors: batch.errors,
      objectKeys,
      businessMetrics: calculateBusinessMetrics(batch.shipments),
      startedAt: context.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - context.startedAt.getTime()
    };
  }

  private async report(run: PipelineRun, shipments: Shipment[]): Promise<void> {
    await this.recordMetrics(run, shipments);

    if (run.fatalError) {
      await this.sendNotification('error', `ETL pipeline failed during ${run.fatalError.stage}`, {
        batchId: run.batchId,
        source: run.source,
        destination: run.destination,
        error: run.fatalError.message
      });
      return;
    }

    const details: NotificationDetails = {
      batchId: run.batchId,
      totalRows: run.totalRows,
      validCount: run.validCount,
      errorCount: run.errorCount,
      objectCount: run.objectKeys.length,
      durationMs: run.durationMs
    };
    if (run.errorCount === 0) {
      await this.sendNotification('success', 'ETL pipeline completed successfully', details);
    } else {
      await this.sendNotification('warning', `ETL pipeline completed with ${run.rejectedCount} rejected row(s)`, details);
    }
  }

  private async recordMetrics(run: PipelineRun, shipments: Shipment[]): Promise<void> {
    const collector = this.metricsCollector;
    if (!collector) return;

    try {
      await collector.recordPipelineRun({
        batchId: run.batchId,
        totalRows: run.totalRows,
        validCount: run.validCount,
        errorCount: run.errorCount,
        durationMs: run.durationMs,
        success: run.success
      });
      if (shipments.length > 0) {
        await collector.recordBusinessMetrics(run.businessMetrics);
      }
      await collector.recordDataQuality({
        totalRecords: run.totalRows,
        validRecords: run.validCount,
        invalidRecords: run.rejectedCount,
        errorCounts: this.countErrors(run.errors)
      });
    } catch (error) {
      console.warn('[ETL] Metrics recording failed:', toError(error).message);
    }
  }

  private async sendNotification(level: NotificationLevel, message: string, details: NotificationDetails): Promise<void> {
    const notifier = this.notificationService;
    if (!notifier) return;

    try {
      const delivered = await notifier.notify(level, message, details);
      if (!delivered) {
        console.warn(`[ETL] ${level} notification was not delivered`);
      }
    } catch (error) {
      console.warn(`[ETL] ${level} notification failed:`, toError(error).message);
    }
  }

  private countErrors(errors: RowError[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const error of errors) {
      const category = error.errorType === 'MALFORMED_ROW'
        ? 'malformed_row'
        : error.tier === 'shape' ? 'shape' : error.rule;
      counts[category] = (counts[category] ?? 0) + 1;
    }
    return counts;
  }
}

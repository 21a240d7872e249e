import 'reflect-metadata';
import { S3Client } from '@aws-sdk/client-s3';
import { container, instanceCachingFactory } from 'tsyringe';
import { IMetricsCollector } from '../adapters/metrics/metrics-collector.interface';
import { MetricsOptions, SimpleMetricsAdapter } from '../adapters/metrics/simple-metrics.adapter';
import { ConsoleNotificationAdapter } from '../adapters/notification/console-notification.adapter';
import { INotificationService } from '../adapters/notification/notification.interface';
import { ISchemaValidator } from '../adapters/schema/schema-validator.interface';
import { ZodSchemaValidator } from '../adapters/schema/zod-schema.validator';
import { CsvShipmentSource } from '../adapters/source/csv-shipment.source';
import { IShipmentSource } from '../adapters/source/shipment-source.interface';
import { LocalObjectStorage } from '../adapters/storage/local-object.storage';
import { IObjectStorage } from '../adapters/storage/object-storage.interface';
import { PartitionedShipmentSink } from '../adapters/storage/partitioned-shipment.sink';
import { S3ObjectStorage } from '../adapters/storage/s3-object.storage';
import { IShipmentSink } from '../adapters/storage/shipment-sink.interface';
import { IShipmentAnalytics } from '../services/shipment-analytics.interface';
import { ShipmentAnalyticsService } from '../services/shipment-analytics.service';
import { IShipmentEtlService } from '../services/shipment-etl.interface';
import { ShipmentEtlService } from '../services/shipment-etl.service';
import { IShipmentValidator } from '../services/shipment-validator.interface';
import { ShipmentValidatorService } from '../services/shipment-validator.service';
import { AppConfig } from './app.config';

function createS3Client(config: AppConfig): S3Client {
  const { region, endpoint, accessKeyId, secretAccessKey, forcePathStyle } = config.aws;
  return new S3Client({
    region,
    endpoint,
    forcePathStyle,
    // Falls back to the SDK's default credential chain when keys are not configured
    credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined
  });
}

export function setupDI(config: AppConfig): void {
  // Register configuration values
  container.register('AppConfig', { useValue: config });
  container.register('LocalStorageRoot', { useValue: config.storage.localRoot });
  container.register('RetryOptions', { useValue: config.retry });
  container.register('ValidationRules', { useValue: config.validation });
  container.register('NotificationLevel', { useValue: config.notifications.level });
  container.register<MetricsOptions>('MetricsOptions', {
    useValue: { filePath: config.metrics.filePath, maxHistory: config.metrics.maxHistory }
  });
  container.register<S3Client>('S3Client', {
    useFactory: instanceCachingFactory(() => createS3Client(config))
  });

  // Register adapters
  container.register<IShipmentSource>('IShipmentSource', {
    useClass: CsvShipmentSource
  });

  container.register<ISchemaValidator>('ISchemaValidator', {
    useClass: ZodSchemaValidator
  });

  container.register<IObjectStorage>('IObjectStorage', {
    useClass: config.storage.backend === 's3' ? S3ObjectStorage : LocalObjectStorage
  });

  container.register<IShipmentSink>('IShipmentSink', {
    useClass: PartitionedShipmentSink
  });

  container.register<INotificationService>('INotificationService', {
    useClass: ConsoleNotificationAdapter
  });

  // One collector per process so the history spans runs
  container.registerSingleton<IMetricsCollector>('IMetricsCollector', SimpleMetricsAdapter);

  // Register services
  container.register<IShipmentValidator>('IShipmentValidator', {
    useClass: ShipmentValidatorService
  });

  container.register<IShipmentAnalytics>('IShipmentAnalytics', {
    useClass: ShipmentAnalyticsService
  });

  // Hooks are left out entirely when disabled
  container.register<IShipmentEtlService>('IShipmentEtlService', {
    useFactory: instanceCachingFactory(c => new ShipmentEtlService(
      c.resolve<IShipmentSource>('IShipmentSource'),
      c.resolve<IShipmentSink>('IShipmentSink'),
      c.resolve<IShipmentValidator>('IShipmentValidator'),
      { prefix: config.storage.prefix, formats: config.storage.formats },
      config.notifications.enabled ? c.resolve<INotificationService>('INotificationService') : undefined,
      config.metrics.enabled ? c.resolve<IMetricsCollector>('IMetricsCollector') : undefined
    ))
  });
}

import 'dotenv/config';
import { NotificationLevel } from '../adapters/notification/notification.interface';
import { ShipmentFileFormat, SHIPMENT_FILE_FORMATS } from '../types/domain.types';
import { RetryOptions } from '../utils/retry.util';
import { ValidationRules } from '../services/shipment-validator.interface';

export type StorageBackend = 'local' | 's3';

export interface AppConfig {
  data: {
    sourcePath: string;
  };
  storage: {
    backend: StorageBackend;
    localRoot: string;
    bucket: string;
    prefix: string;
    formats: ShipmentFileFormat[];
  };
  aws: {
    region: string;
    endpoint?: string;
    accessKeyId?: string;
    secretAccessKey?: string;
    forcePathStyle: boolean;
  };
  retry: RetryOptions;
  validation: ValidationRules;
  notifications: {
    enabled: boolean;
    level: NotificationLevel;
  };
  metrics: {
    enabled: boolean;
    filePath?: string;
    maxHistory: number;
  };
  api: {
    port: number;
  };
}

const NOTIFICATION_LEVELS: readonly NotificationLevel[] = ['success', 'warning', 'error'];
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function readInt(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['true', '1', 'yes'].includes(raw)) return true;
  if (['false', '0', 'no'].includes(raw)) return false;
  throw new Error(`${name} must be true or false, got "${process.env[name]}"`);
}

function readDate(name: string, fallback: string): string {
  const raw = process.env[name]?.trim() || fallback;
  if (!ISO_DATE.test(raw)) {
    throw new Error(`${name} must be a YYYY-MM-DD date, got "${raw}"`);
  }
  return raw;
}

function readOptional(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

function parseBackend(raw: string): StorageBackend {
  if (raw === 'local' || raw === 's3') return raw;
  throw new Error(`STORAGE_BACKEND must be "local" or "s3", got "${raw}"`);
}

function parseFormats(raw: string): ShipmentFileFormat[] {
  const formats: ShipmentFileFormat[] = [];
  for (const item of raw.split(',').map(part => part.trim().toLowerCase()).filter(Boolean)) {
    const format = SHIPMENT_FILE_FORMATS.find(known => known === item);
    if (!format) {
      throw new Error(`OUTPUT_FORMATS contains unsupported format "${item}" (expected ${SHIPMENT_FILE_FORMATS.join(', ')})`);
    }
    if (!formats.includes(format)) formats.push(format);
  }
  if (formats.length === 0) {
    throw new Error('OUTPUT_FORMATS must name at least one format');
  }
  return formats;
}

function parseNotificationLevel(raw: string): NotificationLevel {
  const level = NOTIFICATION_LEVELS.find(known => known === raw);
  if (!level) {
    throw new Error(`NOTIFICATION_LEVEL must be one of ${NOTIFICATION_LEVELS.join(', ')}, got "${raw}"`);
  }
  return level;
}

export function loadConfig(): AppConfig {
  const endpoint = readOptional('AWS_ENDPOINT_URL');

  const earliestShippingDate = readDate('VALIDATION_EARLIEST_SHIPPING_DATE', '2020-01-01');
  const latestShippingDate = readDate('VALIDATION_LATEST_SHIPPING_DATE', '2030-12-31');
  if (earliestShippingDate > latestShippingDate) {
    throw new Error('VALIDATION_EARLIEST_SHIPPING_DATE must not be after VALIDATION_LATEST_SHIPPING_DATE');
  }

  const jitterFactor = readNumber('RETRY_JITTER_FACTOR', 0.1);
  if (jitterFactor < 0 || jitterFactor > 1) {
    throw new Error('RETRY_JITTER_FACTOR must be between 0 and 1');
  }

  const port = readInt('API_PORT', 3001, 1);
  if (port > 65535) {
    throw new Error('API_PORT must be between 1 and 65535');
  }

  return {
    data: {
      sourcePath: process.env.CSV_FILE_PATH || './data/shipments.csv'
    },
    storage: {
      backend: parseBackend((process.env.STORAGE_BACKEND || 'local').trim().toLowerCase()),
      localRoot: process.env.LOCAL_STORAGE_ROOT || './storage',
      bucket: process.env.S3_BUCKET_NAME || 'shipments-bucket',
      prefix: process.env.OUTPUT_PREFIX ?? 'shipments',
      formats: parseFormats(process.env.OUTPUT_FORMATS || 'csv,jsonl')
    },
    aws: {
      region: process.env.AWS_DEFAULT_REGION || 'us-east-1',
      endpoint,
      accessKeyId: readOptional('AWS_ACCESS_KEY_ID'),
      secretAccessKey: readOptional('AWS_SECRET_ACCESS_KEY'),
      forcePathStyle: readBoolean('AWS_FORCE_PATH_STYLE', endpoint !== undefined)
    },
    retry: {
      maxRetries: readInt('RETRY_MAX_ATTEMPTS', 3, 0),
      baseDelay: readInt('RETRY_BASE_DELAY_MS', 1000, 0),
      maxDelay: readInt('RETRY_MAX_DELAY_MS', 10000, 0),
      jitterFactor
    },
    validation: {
      maxAmount: readNumber('VALIDATION_MAX_AMOUNT', 10_000_000),
      earliestShippingDate,
      latestShippingDate,
      maxShippingDurationDays: readInt('VALIDATION_MAX_DURATION_DAYS', 730, 0),
      minProfitMargin: readNumber('VALIDATION_MIN_PROFIT_MARGIN', -1000)
    },
    notifications: {
      enabled: readBoolean('NOTIFICATIONS_ENABLED', true),
      level: parseNotificationLevel((process.env.NOTIFICATION_LEVEL || 'success').trim().toLowerCase())
    },
    metrics: {
      enabled: readBoolean('METRICS_ENABLED', true),
      filePath: readOptional('METRICS_FILE_PATH'),
      maxHistory: readInt('METRICS_MAX_HISTORY', 1000, 1)
    },
    api: {
      port
    }
  };
}

// Domain types - clean models isolated from source and storage formats

export type RawFieldValue = string | number | Date | null | undefined;

/**
 * One row as handed over by a source reader, keyed by column name.
 * Extra columns are carried along untouched.
 */
export type RawShipmentRow = Record<string, RawFieldValue>;

export const REQUIRED_COLUMNS = [
  'guid',
  'origin',
  'destination',
  'cost',
  'revenue',
  'shipping_date',
  'delivery_date'
] as const;

export type RequiredColumn = typeof REQUIRED_COLUMNS[number];

export interface Shipment {
  readonly guid: string;
  readonly origin: string;
  readonly destination: string;
  readonly cost: number;
  readonly revenue: number;
  readonly shippingDate: Date;     // UTC midnight
  readonly deliveryDate: Date;     // UTC midnight

  // Derived at construction
  readonly profit: number;
  readonly profitMargin: number;   // percent
  readonly shippingDurationDays: number;
  readonly isProfitable: boolean;
  readonly isHighMargin: boolean;
  readonly isDelayed: boolean;
  readonly processedAt: Date;
  readonly year: number;
  readonly month: number;          // 1-12
  readonly quarter: number;        // 1-4
  readonly route: string;
}

/** Serialized form written to storage, one per shipment. */
export interface ShipmentRecord {
  guid: string;
  origin: string;
  destination: string;
  cost: number;
  revenue: number;
  shipping_date: string;           // YYYY-MM-DD
  delivery_date: string;           // YYYY-MM-DD
  profit: number;
  profit_margin: number;
  shipping_duration_days: number;
  is_profitable: boolean;
  is_high_margin: boolean;
  is_delayed: boolean;
  processed_at: string;            // ISO 8601
  year: number;
  month: number;
  quarter: number;
}

export type ShipmentFileFormat = 'csv' | 'jsonl' | 'parquet';

export const SHIPMENT_FILE_FORMATS: readonly ShipmentFileFormat[] = ['csv', 'jsonl', 'parquet'];

export interface BusinessMetrics {
  totalShipments: number;
  profitableShipments: number;
  highMarginShipments: number;
  delayedShipments: number;
  profitabilityRate: number;
  highMarginRate: number;
  delayedRate: number;
  totalRevenue: number;
  totalCost: number;
  totalProfit: number;
  avgProfitMargin: number;
  avgShippingDurationDays: number;
}

// Shipment construction and derived-field rules

import { RawFieldValue, RawShipmentRow, RequiredColumn, Shipment, ShipmentRecord } from '../types/domain.types';
import { MalformedRowError } from '../types/errors';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const AMOUNT_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

export const HIGH_MARGIN_THRESHOLD = 20;     // percent, exclusive
export const DELAY_THRESHOLD_DAYS = 7;       // exclusive

/**
 * Parses a calendar date (YYYY-MM-DD, optionally followed by a time part)
 * into a Date at UTC midnight. Returns null for anything that is not a
 * real calendar date.
 */
export function parseCalendarDate(value: RawFieldValue): Date | null {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));
  }
  if (typeof value !== 'string') return null;

  const match = value.trim().match(CALENDAR_DATE_PATTERN);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  // Date.UTC rolls 2024-02-30 over to March; reject instead
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date;
}

export function parseAmount(value: RawFieldValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const trimmed = value.trim();
  if (!AMOUNT_PATTERN.test(trimmed)) return null;
  const amount = Number(trimmed);
  return Number.isFinite(amount) ? amount : null;
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function calculateQuarter(month: number): number {
  return Math.floor((month - 1) / 3) + 1;
}

export function buildRoute(origin: string, destination: string): string {
  return `${origin} -> ${destination}`;
}

export function isBlank(value: RawFieldValue): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function describe(value: RawFieldValue): string {
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function requireText(row: RawShipmentRow, field: RequiredColumn): string {
  const value = row[field];
  if (isBlank(value)) {
    throw new MalformedRowError(`Missing required field: ${field}`, field);
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new MalformedRowError(`${field} must be text, got ${describe(value)}`, field);
  }
  return String(value).trim();
}

function requireAmount(row: RawShipmentRow, field: 'cost' | 'revenue'): number {
  const value = row[field];
  if (isBlank(value)) {
    throw new MalformedRowError(`Missing required field: ${field}`, field);
  }
  const amount = parseAmount(value);
  if (amount === null) {
    throw new MalformedRowError(`${field} must be a number, got "${describe(value)}"`, field);
  }
  if (amount < 0) {
    throw new MalformedRowError(`${field} must be non-negative, got ${amount}`, field);
  }
  return amount;
}

function requireDate(row: RawShipmentRow, field: 'shipping_date' | 'delivery_date'): Date {
  const value = row[field];
  if (isBlank(value)) {
    throw new MalformedRowError(`Missing required field: ${field}`, field);
  }
  const date = parseCalendarDate(value);
  if (date === null) {
    throw new MalformedRowError(`${field} is not a valid date: "${describe(value)}"`, field);
  }
  return date;
}

/**
 * Builds a Shipment from one raw row, computing every derived field.
 * Pure: the caller supplies processedAt so a whole batch shares one value.
 *
 * @throws MalformedRowError when a required field is missing or unparseable,
 * an amount is negative, or delivery precedes shipping.
 */
export function buildShipment(row: RawShipmentRow, processedAt: Date): Shipment {
  const guid = requireText(row, 'guid').toUpperCase();
  const origin = requireText(row, 'origin');
  const destination = requireText(row, 'destination');
  const cost = requireAmount(row, 'cost');
  const revenue = requireAmount(row, 'revenue');
  const shippingDate = requireDate(row, 'shipping_date');
  const deliveryDate = requireDate(row, 'delivery_date');

  if (deliveryDate.getTime() < shippingDate.getTime()) {
    throw new MalformedRowError(
      `delivery_date ${formatCalendarDate(deliveryDate)} is before shipping_date ${formatCalendarDate(shippingDate)}`,
      'delivery_date'
    );
  }

  const profit = revenue - cost;
  const profitMargin = revenue > 0 ? (profit / revenue) * 100 : 0;
  const shippingDurationDays = Math.round((deliveryDate.getTime() - shippingDate.getTime()) / MS_PER_DAY);
  const month = shippingDate.getUTCMonth() + 1;

  return Object.freeze({
    guid,
    origin,
    destination,
    cost,
    revenue,
    shippingDate,
    deliveryDate,
    profit,
    profitMargin,
    shippingDurationDays,
    isProfitable: profit > 0,
    isHighMargin: profitMargin > HIGH_MARGIN_THRESHOLD,
    isDelayed: shippingDurationDays > DELAY_THRESHOLD_DAYS,
    processedAt: new Date(processedAt.getTime()),
    year: shippingDate.getUTCFullYear(),
    month,
    quarter: calculateQuarter(month),
    route: buildRoute(origin, destination)
  });
}

export function toShipmentRecord(shipment: Shipment): ShipmentRecord {
  return {
    guid: shipment.guid,
    origin: shipment.origin,
    destination: shipment.destination,
    cost: shipment.cost,
    revenue: shipment.revenue,
    shipping_date: formatCalendarDate(shipment.shippingDate),
    delivery_date: formatCalendarDate(shipment.deliveryDate),
    profit: shipment.profit,
    profit_margin: shipment.profitMargin,
    shipping_duration_days: shipment.shippingDurationDays,
    is_profitable: shipment.isProfitable,
    is_high_margin: shipment.isHighMargin,
    is_delayed: shipment.isDelayed,
    processed_at: shipment.processedAt.toISOString(),
    year: shipment.year,
    month: shipment.month,
    quarter: shipment.quarter
  };
}

export function toRawRow(shipment: Shipment): RawShipmentRow {
  const record = toShipmentRecord(shipment);
  return {
    guid: record.guid,
    origin: record.origin,
    destination: record.destination,
    cost: record.cost,
    revenue: record.revenue,
    shipping_date: record.shipping_date,
    delivery_date: record.delivery_date
  };
}

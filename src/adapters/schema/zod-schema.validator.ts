import { injectable } from 'tsyringe';
import { z } from 'zod';
import { RawShipmentRow } from '../../types/domain.types';
import { AcceptedRow } from '../../types/result.types';
import { parseAmount, parseCalendarDate } from '../../utils/shipment.util';
import { ISchemaValidator, RejectedRow, SchemaCheckResult } from './schema-validator.interface';

const NULL_MARKERS = new Set(['NULL', 'N/A']);
const MAX_LOCATION_LENGTH = 100;

function blankToUndefined(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

function textColumn(maxLength?: number) {
  const base = z.string({ required_error: 'is required', invalid_type_error: 'must be text' });
  const bounded = maxLength ? base.max(maxLength, `must be at most ${maxLength} characters`) : base;

  return z.preprocess(value => {
    const normalized = blankToUndefined(value);
    if (typeof normalized === 'number') return String(normalized);
    return typeof normalized === 'string' ? normalized.trim() : normalized;
  }, bounded.refine(v => !NULL_MARKERS.has(v.toUpperCase()), 'must not be a null marker'));
}

const amountColumn = z.preprocess(value => {
  const normalized = blankToUndefined(value);
  return typeof normalized === 'string' ? parseAmount(normalized) ?? normalized : normalized;
}, z.number({ required_error: 'is required', invalid_type_error: 'must be a number' }).finite('must be finite'));

const dateColumn = z.preprocess(value => {
  const normalized = blankToUndefined(value);
  if (typeof normalized === 'string' || normalized instanceof Date) {
    return parseCalendarDate(normalized) ?? normalized;
  }
  return normalized;
}, z.date({ required_error: 'is required', invalid_type_error: 'must be a calendar date (YYYY-MM-DD)' }));

// Zod schema for the columns every source row must carry
export const ShipmentRowSchema = z.object({
  guid: textColumn(),
  origin: textColumn(MAX_LOCATION_LENGTH),
  destination: textColumn(MAX_LOCATION_LENGTH),
  cost: amountColumn,
  revenue: amountColumn,
  shipping_date: dateColumn,
  delivery_date: dateColumn
});

@injectable()
export class ZodSchemaValidator implements ISchemaValidator {
  check(rows: readonly RawShipmentRow[]): SchemaCheckResult {
    const accepted: AcceptedRow[] = [];
    const rejected: RejectedRow[] = [];

    rows.forEach((row, index) => {
      const rowNumber = index + 1;
      const result = ShipmentRowSchema.safeParse(row);

      if (result.success) {
        accepted.push({ rowNumber, row });
        return;
      }

      rejected.push({
        rowNumber,
        reasons: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        rawData: row
      });
    });

    return { accepted, rejected };
  }
}

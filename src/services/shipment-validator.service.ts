import { inject, injectable } from 'tsyringe';
import { ISchemaValidator } from '../adapters/schema/schema-validator.interface';
import { RawShipmentRow, Shipment } from '../types/domain.types';
import { BusinessRuleName, RowError, ShapeValidationResult, ValidationResult } from '../types/result.types';
import { round2 } from '../utils/math.util';
import { formatCalendarDate, parseCalendarDate, toRawRow } from '../utils/shipment.util';
import { IShipmentValidator, RowSource, ValidationRules } from './shipment-validator.interface';

interface BusinessRule {
  name: BusinessRuleName;
  check(shipment: Shipment): string | null;
}

@injectable()
export class ShipmentValidatorService implements IShipmentValidator {
  private readonly earliestShippingDate: Date;
  private readonly latestShippingDate: Date;

  constructor(
    @inject('ISchemaValidator') private readonly schemaValidator: ISchemaValidator,
    @inject('ValidationRules') private readonly rules: ValidationRules
  ) {
    const earliest = parseCalendarDate(rules.earliestShippingDate);
    const latest = parseCalendarDate(rules.latestShippingDate);
    if (!earliest || !latest) {
      throw new Error(`Invalid shipping date window: ${rules.earliestShippingDate}..${rules.latestShippingDate}`);
    }
    this.earliestShippingDate = earliest;
    this.latestShippingDate = latest;
  }

  validateBatchShape(rows: readonly RawShipmentRow[]): ShapeValidationResult {
    const { accepted, rejected } = this.schemaValidator.check(rows);

    const errors = rejected.map((rejection): RowError => ({
      rowNumber: rejection.rowNumber,
      guid: this.readGuid(rejection.rawData),
      errorType: 'VALIDATION_ERROR',
      tier: 'shape',
      message: `Schema validation failed: ${rejection.reasons.join(', ')}`,
      rawData: rejection.rawData
    }));

    return { accepted, errors };
  }

  validateShipments(shipments: readonly Shipment[], sources?: readonly RowSource[]): ValidationResult {
    const valid: Shipment[] = [];
    const errors: RowError[] = [];
    const firstRowByGuid = new Map<string, number>();
    const rules = this.buildRules(firstRowByGuid);

    shipments.forEach((shipment, index) => {
      const source = sources?.[index] ?? { rowNumber: index + 1, rawData: toRawRow(shipment) };
      const rowErrors: RowError[] = [];

      for (const rule of rules) {
        const message = rule.check(shipment);
        if (message !== null) {
          rowErrors.push({
            rowNumber: source.rowNumber,
            guid: shipment.guid,
            errorType: 'VALIDATION_ERROR',
            tier: 'business_rule',
            rule: rule.name,
            message,
            rawData: source.rawData
          });
        }
      }

      if (!firstRowByGuid.has(shipment.guid)) {
        firstRowByGuid.set(shipment.guid, source.rowNumber);
      }

      if (rowErrors.length === 0) {
        valid.push(shipment);
      } else {
        errors.push(...rowErrors);
      }
    });

    return { valid, errors };
  }

  private buildRules(firstRowByGuid: ReadonlyMap<string, number>): BusinessRule[] {
    const { maxAmount, maxShippingDurationDays, minProfitMargin } = this.rules;

    return [
      {
        name: 'DUPLICATE_GUID',
        check: shipment => {
          const firstRow = firstRowByGuid.get(shipment.guid);
          return firstRow === undefined ? null : `Duplicate guid ${shipment.guid} (first seen in row ${firstRow})`;
        }
      },
      {
        name: 'COST_OUT_OF_RANGE',
        check: shipment => shipment.cost > maxAmount ? `cost ${shipment.cost} exceeds maximum of ${maxAmount}` : null
      },
      {
        name: 'REVENUE_OUT_OF_RANGE',
        check: shipment => shipment.revenue > maxAmount ? `revenue ${shipment.revenue} exceeds maximum of ${maxAmount}` : null
      },
      {
        name: 'DEGENERATE_ROUTE',
        check: shipment => shipment.origin.toLowerCase() === shipment.destination.toLowerCase()
          ? `origin and destination are the same (${shipment.origin})`
          : null
      },
      {
        name: 'SHIPPING_DATE_OUT_OF_RANGE',
        check: shipment => {
          const time = shipment.shippingDate.getTime();
          if (time >= this.earliestShippingDate.getTime() && time <= this.latestShippingDate.getTime()) {
            return null;
          }
          return `shipping_date ${formatCalendarDate(shipment.shippingDate)} is outside ${this.rules.earliestShippingDate}..${this.rules.latestShippingDate}`;
        }
      },
      {
        name: 'DURATION_OUT_OF_RANGE',
        check: shipment => shipment.shippingDurationDays > maxShippingDurationDays
          ? `shipping duration ${shipment.shippingDurationDays} days exceeds maximum of ${maxShippingDurationDays}`
          : null
      },
      {
        name: 'PROFIT_MARGIN_OUT_OF_RANGE',
        check: shipment => shipment.profitMargin < minProfitMargin
          ? `profit margin ${round2(shipment.profitMargin)}% is below minimum of ${minProfitMargin}%`
          : null
      }
    ];
  }

  private readGuid(row: RawShipmentRow): string | undefined {
    const guid = row.guid;
    if (typeof guid === 'string' && guid.trim() !== '') return guid.trim().toUpperCase();
    if (typeof guid === 'number') return String(guid);
    return undefined;
  }
}

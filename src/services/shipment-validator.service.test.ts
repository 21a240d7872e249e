import 'reflect-metadata';
import { ISchemaValidator } from '../adapters/schema/schema-validator.interface';
import { ZodSchemaValidator } from '../adapters/schema/zod-schema.validator';
import { RawShipmentRow } from '../types/domain.types';
import { buildShipment } from '../utils/shipment.util';
import { DEFAULT_VALIDATION_RULES } from './shipment-validator.interface';
import { ShipmentValidatorService } from './shipment-validator.service';

const PROCESSED_AT = new Date('2024-06-01T00:00:00.000Z');

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

function shipment(overrides: RawShipmentRow = {}) {
  return buildShipment(row(overrides), PROCESSED_AT);
}

describe('ShipmentValidatorService', () => {
  let validator: ShipmentValidatorService;

  beforeEach(() => {
    validator = new ShipmentValidatorService(new ZodSchemaValidator(), DEFAULT_VALIDATION_RULES);
  });

  describe('validateBatchShape', () => {
    // Test: Rejected rows become shape-tier errors
    it('should turn rejected rows into shape errors and keep the partition', () => {
      // Arrange
      const rows = [row(), row({ guid: ' abc124 ', revenue: 'n/a' }), row({ guid: 'ABC125' })];

      // Act
      const result = validator.validateBatchShape(rows);

      // Assert
      expect(result.accepted.map(a => a.rowNumber)).toEqual([1, 3]);
      expect(result.errors).toEqual([{
        rowNumber: 2,
        guid: 'ABC124',
        errorType: 'VALIDATION_ERROR',
        tier: 'shape',
        message: 'Schema validation failed: revenue: must be a number',
        rawData: rows[1]
      }]);
      expect(result.accepted.length + result.errors.length).toBe(rows.length);
    });

    // Test: Delegates to the schema adapter
    it('should use the injected schema validator', () => {
      // Arrange
      const schemaValidator: jest.Mocked<ISchemaValidator> = {
        check: jest.fn().mockReturnValue({ accepted: [], rejected: [{ rowNumber: 1, reasons: ['guid: is required'], rawData: {} }] })
      };
      const service = new ShipmentValidatorService(schemaValidator, DEFAULT_VALIDATION_RULES);

      // Act
      const result = service.validateBatchShape([{}]);

      // Assert
      expect(schemaValidator.check).toHaveBeenCalledWith([{}]);
      expect(result.errors[0].guid).toBeUndefined();
      expect(result.errors[0].message).toBe('Schema validation failed: guid: is required');
    });
  });

  describe('validateShipments', () => {
    // Test: Valid shipments pass through
    it('should accept shipments that satisfy every rule', () => {
      // Arrange
      const shipments = [shipment(), shipment({ guid: 'ABC124' })];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.valid).toEqual(shipments);
      expect(result.errors).toEqual([]);
    });

    // Test: Duplicates keep the first occurrence
    it('should reject later duplicates and name the first row', () => {
      // Arrange
      const shipments = [shipment(), shipment({ guid: 'ABC124' }), shipment({ guid: 'abc123' })];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.valid.map(s => s.guid)).toEqual(['ABC123', 'ABC124']);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        rowNumber: 3,
        guid: 'ABC123',
        tier: 'business_rule',
        rule: 'DUPLICATE_GUID',
        message: 'Duplicate guid ABC123 (first seen in row 1)'
      });
    });

    // Test: Row numbers and raw data come from the sources when given
    it('should report original row numbers and raw rows from sources', () => {
      // Arrange
      const raw = row({ destination: 'ny' });
      const shipments = [buildShipment(raw, PROCESSED_AT)];

      // Act
      const result = validator.validateShipments(shipments, [{ rowNumber: 7, rawData: raw }]);

      // Assert
      expect(result.errors).toEqual([{
        rowNumber: 7,
        guid: 'ABC123',
        errorType: 'VALIDATION_ERROR',
        tier: 'business_rule',
        rule: 'DEGENERATE_ROUTE',
        message: 'origin and destination are the same (NY)',
        rawData: raw
      }]);
    });

    // Test: Amount limit
    it('should reject a cost above the maximum amount', () => {
      // Arrange: margin stays just below zero, well above the minimum
      const shipments = [shipment({ cost: '10000001', revenue: '10000000' })];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.valid).toEqual([]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        rowNumber: 1,
        rule: 'COST_OUT_OF_RANGE',
        message: 'cost 10000001 exceeds maximum of 10000000'
      });
    });

    // Test: Every failing rule adds an entry, in rule order
    it('should report each failing rule for the same shipment in order', () => {
      // Arrange
      const shipments = [shipment({ origin: 'Seattle', destination: 'seattle', revenue: '20000000' })];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.valid).toEqual([]);
      expect(result.errors.map(e => e.errorType === 'VALIDATION_ERROR' && e.tier === 'business_rule' && e.rule)).toEqual([
        'REVENUE_OUT_OF_RANGE',
        'DEGENERATE_ROUTE'
      ]);
      expect(result.errors[1].message).toBe('origin and destination are the same (Seattle)');
    });

    // Test: Shipping date window is inclusive
    it('should accept the window edges and reject dates outside', () => {
      // Arrange
      const shipments = [
        shipment({ guid: 'A', shipping_date: '2020-01-01', delivery_date: '2020-01-02' }),
        shipment({ guid: 'B', shipping_date: '2030-12-31', delivery_date: '2031-01-02' }),
        shipment({ guid: 'C', shipping_date: '2019-12-31', delivery_date: '2020-01-02' })
      ];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.valid.map(s => s.guid)).toEqual(['A', 'B']);
      expect(result.errors[0].message).toBe('shipping_date 2019-12-31 is outside 2020-01-01..2030-12-31');
    });

    // Test: Duration limit
    it('should reject durations above the maximum', () => {
      // Arrange: 730 and 731 days
      const shipments = [
        shipment({ guid: 'A', shipping_date: '2024-01-01', delivery_date: '2025-12-31' }),
        shipment({ guid: 'B', shipping_date: '2024-01-01', delivery_date: '2026-01-01' })
      ];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.valid.map(s => s.guid)).toEqual(['A']);
      expect(result.errors[0].message).toBe('shipping duration 731 days exceeds maximum of 730');
    });

    // Test: Margin floor
    it('should reject margins below the minimum', () => {
      // Arrange: profit -19000 on revenue 1000
      const shipments = [shipment({ cost: '20000', revenue: '1000' })];

      // Act
      const result = validator.validateShipments(shipments);

      // Assert
      expect(result.errors[0].message).toBe('profit margin -1900% is below minimum of -1000%');
    });

    // Test: Configured thresholds replace the defaults
    it('should apply configured thresholds', () => {
      // Arrange
      const strict = new ShipmentValidatorService(new ZodSchemaValidator(), {
        ...DEFAULT_VALIDATION_RULES,
        maxAmount: 1000
      });

      // Act
      const result = strict.validateShipments([shipment()]);

      // Assert
      expect(result.errors.map(e => e.message)).toEqual([
        'cost 1200.5 exceeds maximum of 1000',
        'revenue 1800 exceeds maximum of 1000'
      ]);
    });

    // Test: Same input gives the same outcome
    it('should be deterministic', () => {
      // Arrange
      const shipments = [shipment(), shipment(), shipment({ guid: 'B', origin: 'LA' })];

      // Act & Assert
      expect(validator.validateShipments(shipments)).toEqual(validator.validateShipments(shipments));
    });
  });

  // Test: Window must be parseable
  it('should refuse an invalid shipping date window', () => {
    expect(() => new ShipmentValidatorService(new ZodSchemaValidator(), {
      ...DEFAULT_VALIDATION_RULES,
      earliestShippingDate: 'soon'
    })).toThrow('Invalid shipping date window: soon..2030-12-31');
  });
});

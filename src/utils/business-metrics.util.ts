import { BusinessMetrics, Shipment } from '../types/domain.types';
import { average, percentage, round2 } from './math.util';

export function calculateBusinessMetrics(shipments: readonly Shipment[]): BusinessMetrics {
  const totalShipments = shipments.length;
  const profitableShipments = shipments.filter(s => s.isProfitable).length;
  const highMarginShipments = shipments.filter(s => s.isHighMargin).length;
  const delayedShipments = shipments.filter(s => s.isDelayed).length;

  const totalRevenue = shipments.reduce((sum, s) => sum + s.revenue, 0);
  const totalCost = shipments.reduce((sum, s) => sum + s.cost, 0);

  return {
    totalShipments,
    profitableShipments,
    highMarginShipments,
    delayedShipments,
    profitabilityRate: percentage(profitableShipments, totalShipments),
    highMarginRate: percentage(highMarginShipments, totalShipments),
    delayedRate: percentage(delayedShipments, totalShipments),
    totalRevenue: round2(totalRevenue),
    totalCost: round2(totalCost),
    totalProfit: round2(totalRevenue - totalCost),
    avgProfitMargin: round2(average(shipments.map(s => s.profitMargin))),
    avgShippingDurationDays: round2(average(shipments.map(s => s.shippingDurationDays)))
  };
}

import { injectable } from 'tsyringe';
import { Shipment } from '../types/domain.types';
import { average, percentage, round2 } from '../utils/math.util';
import {
  BusinessHealth,
  BusinessInsights,
  IShipmentAnalytics,
  OptimizationOpportunities,
  PeriodMetrics,
  Recommendation,
  RouteMetrics,
  TemporalTrends
} from './shipment-analytics.interface';

const LOW_MARGIN_THRESHOLD = 10;
const PRICE_INCREASE_MARGIN = 30;
const PRICE_INCREASE_MAX_DURATION = 20;
const SLOW_ROUTE_DURATION = 45;
const HIGH_PERFORMER_MARGIN = 25;
const HIGH_PERFORMER_MAX_DURATION = 30;
const HIGH_PERFORMER_MIN_SHIPMENTS = 3;
const HIGH_VOLUME_SHIPMENTS = 5;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

function groupBy<K>(shipments: readonly Shipment[], keyOf: (shipment: Shipment) => K): Map<K, Shipment[]> {
  const groups = new Map<K, Shipment[]>();
  for (const shipment of shipments) {
    const key = keyOf(shipment);
    const group = groups.get(key);
    if (group) {
      group.push(shipment);
    } else {
      groups.set(key, [shipment]);
    }
  }
  return groups;
}

@injectable()
export class ShipmentAnalyticsService implements IShipmentAnalytics {
  analyzeRoutes(shipments: readonly Shipment[]): RouteMetrics[] {
    const metrics: RouteMetrics[] = [];

    for (const [route, group] of groupBy(shipments, s => s.route)) {
      const totalRevenue = group.reduce((sum, s) => sum + s.revenue, 0);
      const totalCost = group.reduce((sum, s) => sum + s.cost, 0);
      const delayedShipments = group.filter(s => s.isDelayed).length;

      metrics.push({
        route,
        totalShipments: group.length,
        totalRevenue: round2(totalRevenue),
        totalCost: round2(totalCost),
        totalProfit: round2(group.reduce((sum, s) => sum + s.profit, 0)),
        avgProfitMargin: round2(average(group.map(s => s.profitMargin))),
        avgDurationDays: round2(average(group.map(s => s.shippingDurationDays))),
        delayedShipments,
        delayRate: percentage(delayedShipments, group.length)
      });
    }

    return metrics.sort((a, b) => compareText(a.route, b.route));
  }

  /**
   * Routes ranked by total profit. Ties go to the route with more shipments,
   * then to the alphabetically first route.
   */
  mostProfitableRoutes(shipments: readonly Shipment[], limit = 5): RouteMetrics[] {
    return this.analyzeRoutes(shipments)
      .sort((a, b) =>
        b.totalProfit - a.totalProfit ||
        b.totalShipments - a.totalShipments ||
        compareText(a.route, b.route)
      )
      .slice(0, Math.max(0, limit));
  }

  averageDurationByRoute(shipments: readonly Shipment[]): Record<string, number> {
    const result: Record<string, number> = {};
    for (const metrics of this.analyzeRoutes(shipments)) {
      result[metrics.route] = metrics.avgDurationDays;
    }
    return result;
  }

  delayRateByRoute(shipments: readonly Shipment[]): Record<string, number> {
    const result: Record<string, number> = {};
    for (const metrics of this.analyzeRoutes(shipments)) {
      result[metrics.route] = metrics.delayRate;
    }
    return result;
  }

  analyzeTemporalTrends(shipments: readonly Shipment[]): TemporalTrends {
    const monthly = groupBy(shipments, s => `${s.year}-${String(s.month).padStart(2, '0')}`);
    const quarterly = groupBy(shipments, s => `${s.year}-Q${s.quarter}`);

    return {
      monthly: this.summarizePeriods(monthly),
      quarterly: this.summarizePeriods(quarterly)
    };
  }

  identifyOptimizationOpportunities(shipments: readonly Shipment[]): OptimizationOpportunities {
    const routes = this.analyzeRoutes(shipments);

    const costReductionRoutes = routes.filter(r => r.avgProfitMargin < LOW_MARGIN_THRESHOLD);
    const priceIncreaseCandidates = routes.filter(
      r => r.avgProfitMargin > PRICE_INCREASE_MARGIN && r.avgDurationDays < PRICE_INCREASE_MAX_DURATION
    );
    const processImprovementNeeded = routes.filter(r => r.avgDurationDays > SLOW_ROUTE_DURATION);
    const highPerformers = routes.filter(
      r => r.avgProfitMargin > HIGH_PERFORMER_MARGIN &&
        r.avgDurationDays < HIGH_PERFORMER_MAX_DURATION &&
        r.totalShipments >= HIGH_PERFORMER_MIN_SHIPMENTS
    );

    return {
      costReductionRoutes,
      priceIncreaseCandidates,
      processImprovementNeeded,
      highPerformers,
      summary: {
        totalRoutesAnalyzed: routes.length,
        lowMarginRoutesCount: costReductionRoutes.length,
        highPerformingRoutesCount: priceIncreaseCandidates.length,
        slowRoutesCount: processImprovementNeeded.length,
        optimizationPotential: costReductionRoutes.length + processImprovementNeeded.length,
        recommendations: this.prioritizeRecommendations(costReductionRoutes, processImprovementNeeded, priceIncreaseCandidates)
      }
    };
  }

  generateBusinessInsights(shipments: readonly Shipment[]): BusinessInsights {
    const routeAnalysis = this.analyzeRoutes(shipments);
    const businessHealth = this.calculateBusinessHealth(shipments);

    return {
      businessHealth,
      routeAnalysis,
      temporalAnalysis: this.analyzeTemporalTrends(shipments),
      optimizationOpportunities: this.identifyOptimizationOpportunities(shipments),
      keyInsights: this.buildKeyInsights(shipments.length, routeAnalysis, businessHealth)
    };
  }

  private summarizePeriods(groups: Map<string, Shipment[]>): Record<string, PeriodMetrics> {
    const result: Record<string, PeriodMetrics> = {};

    for (const key of [...groups.keys()].sort(compareText)) {
      const group = groups.get(key) ?? [];
      const totalRevenue = group.reduce((sum, s) => sum + s.revenue, 0);
      const totalProfit = group.reduce((sum, s) => sum + s.profit, 0);
      const profitableShipments = group.filter(s => s.isProfitable).length;

      result[key] = {
        shipments: group.length,
        totalRevenue: round2(totalRevenue),
        totalCost: round2(group.reduce((sum, s) => sum + s.cost, 0)),
        totalProfit: round2(totalProfit),
        profitableShipments,
        profitMargin: totalRevenue > 0 ? round2((totalProfit / totalRevenue) * 100) : 0,
        profitabilityRate: percentage(profitableShipments, group.length)
      };
    }
    return result;
  }

  private calculateBusinessHealth(shipments: readonly Shipment[]): BusinessHealth {
    const total = shipments.length;
    const profitabilityScore = percentage(shipments.filter(s => s.isProfitable).length, total);
    const efficiencyScore = percentage(shipments.filter(s => !s.isDelayed).length, total);
    const marginQualityScore = percentage(shipments.filter(s => s.isHighMargin).length, total);

    return {
      profitabilityScore,
      efficiencyScore,
      marginQualityScore,
      overallScore: round2(profitabilityScore * 0.4 + efficiencyScore * 0.3 + marginQualityScore * 0.3)
    };
  }

  private prioritizeRecommendations(
    lowMargin: RouteMetrics[],
    slow: RouteMetrics[],
    priceIncrease: RouteMetrics[]
  ): Recommendation[] {
    const recommendations: Recommendation[] = [];

    const highVolumeLowMargin = lowMargin.filter(r => r.totalShipments >= HIGH_VOLUME_SHIPMENTS);
    if (highVolumeLowMargin.length > 0) {
      recommendations.push({
        priority: 'HIGH',
        action: 'Cost Reduction',
        description: `Focus on ${highVolumeLowMargin.length} high-volume, low-margin route(s)`,
        impact: 'High revenue impact potential'
      });
    }
    if (slow.length > 0) {
      recommendations.push({
        priority: 'MEDIUM',
        action: 'Process Improvement',
        description: `Improve ${slow.length} slow route(s)`,
        impact: 'Customer satisfaction and efficiency gains'
      });
    }
    if (priceIncrease.length > 0) {
      recommendations.push({
        priority: 'LOW',
        action: 'Price Optimization',
        description: `Consider price increases on ${priceIncrease.length} high-performing route(s)`,
        impact: 'Margin improvement with low risk'
      });
    }
    return recommendations;
  }

  private buildKeyInsights(total: number, routes: RouteMetrics[], health: BusinessHealth): string[] {
    if (total === 0) return ['No shipments to analyze'];

    const insights: string[] = [];

    if (health.profitabilityScore > 80) {
      insights.push('Strong profitability across shipments');
    } else if (health.profitabilityScore > 60) {
      insights.push('Moderate profitability - some room for improvement');
    } else {
      insights.push('Low profitability - cost structure needs attention');
    }

    const best = routes.reduce((a, b) => (b.avgProfitMargin > a.avgProfitMargin ? b : a));
    const worst = routes.reduce((a, b) => (b.avgProfitMargin < a.avgProfitMargin ? b : a));
    insights.push(`Best performing route: ${best.route} (${best.avgProfitMargin.toFixed(1)}% margin)`);
    insights.push(`Worst performing route: ${worst.route} (${worst.avgProfitMargin.toFixed(1)}% margin)`);

    if (health.efficiencyScore > 85) {
      insights.push('Excellent shipping efficiency - most deliveries are on time');
    } else if (health.efficiencyScore > 70) {
      insights.push('Good shipping efficiency with room for improvement');
    } else {
      insights.push('Shipping delays are impacting the business - process review needed');
    }

    return insights;
  }
}

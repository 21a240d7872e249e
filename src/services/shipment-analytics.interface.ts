import { Shipment } from '../types/domain.types';

export interface RouteMetrics {
  route: string;
  totalShipments: number;
  totalRevenue: number;
  totalCost: number;
  totalProfit: number;
  avgProfitMargin: number;
  avgDurationDays: number;
  delayedShipments: number;
  delayRate: number;            // percent
}

export interface PeriodMetrics {
  shipments: number;
  totalRevenue: number;
  totalCost: number;
  totalProfit: number;
  profitableShipments: number;
  profitMargin: number;         // total profit / total revenue, percent
  profitabilityRate: number;    // percent
}

export interface TemporalTrends {
  monthly: Record<string, PeriodMetrics>;     // YYYY-MM
  quarterly: Record<string, PeriodMetrics>;   // YYYY-Qn
}

export type RecommendationPriority = 'HIGH' | 'MEDIUM' | 'LOW';

export interface Recommendation {
  priority: RecommendationPriority;
  action: string;
  description: string;
  impact: string;
}

export interface OptimizationOpportunities {
  costReductionRoutes: RouteMetrics[];
  priceIncreaseCandidates: RouteMetrics[];
  processImprovementNeeded: RouteMetrics[];
  highPerformers: RouteMetrics[];
  summary: {
    totalRoutesAnalyzed: number;
    lowMarginRoutesCount: number;
    highPerformingRoutesCount: number;
    slowRoutesCount: number;
    optimizationPotential: number;
    recommendations: Recommendation[];
  };
}

export interface BusinessHealth {
  profitabilityScore: number;
  efficiencyScore: number;
  marginQualityScore: number;
  overallScore: number;
}

export interface BusinessInsights {
  businessHealth: BusinessHealth;
  routeAnalysis: RouteMetrics[];
  temporalAnalysis: TemporalTrends;
  optimizationOpportunities: OptimizationOpportunities;
  keyInsights: string[];
}

/**
 * Read-only aggregation over validated shipments. Never mutates its input.
 */
export interface IShipmentAnalytics {
  analyzeRoutes(shipments: readonly Shipment[]): RouteMetrics[];
  mostProfitableRoutes(shipments: readonly Shipment[], limit?: number): RouteMetrics[];
  averageDurationByRoute(shipments: readonly Shipment[]): Record<string, number>;
  delayRateByRoute(shipments: readonly Shipment[]): Record<string, number>;
  analyzeTemporalTrends(shipments: readonly Shipment[]): TemporalTrends;
  identifyOptimizationOpportunities(shipments: readonly Shipment[]): OptimizationOpportunities;
  generateBusinessInsights(shipments: readonly Shipment[]): BusinessInsights;
}

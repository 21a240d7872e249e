import { BusinessMetrics } from '../../types/domain.types';

export interface PipelineRunSummary {
  batchId: string;
  totalRows: number;
  validCount: number;
  errorCount: number;
  durationMs: number;
  success: boolean;
}

export interface DataQualityReport {
  totalRecords: number;
  validRecords: number;
  invalidRecords: number;
  errorCounts: Record<string, number>;   // keyed by error type, tier or rule
}

export type MetricEntry =
  | { metricType: 'pipeline_run'; timestamp: string; throughputRecordsPerSecond: number } & PipelineRunSummary
  | { metricType: 'business_metrics'; timestamp: string } & BusinessMetrics
  | { metricType: 'data_quality'; timestamp: string; dataQualityRate: number; errorRate: number } & DataQualityReport;

export interface MetricsSummary {
  totalMetricsCollected: number;
  pipelineRunsCount: number;
  businessMetricsCount: number;
  dataQualityMetricsCount: number;
  latestPipelineRun?: MetricEntry;
  latestBusinessMetrics?: MetricEntry;
  latestDataQuality?: MetricEntry;
}

/**
 * Best-effort metrics sink. Implementations must not throw for recording failures
 * that the pipeline should ignore; the orchestrator also guards every call.
 */
export interface IMetricsCollector {
  recordPipelineRun(summary: PipelineRunSummary): Promise<void>;
  recordBusinessMetrics(metrics: BusinessMetrics): Promise<void>;
  recordDataQuality(report: DataQualityReport): Promise<void>;
  getMetricsSummary(): MetricsSummary;
}

import { appendFile } from 'fs/promises';
import { inject, injectable } from 'tsyringe';
import { BusinessMetrics } from '../../types/domain.types';
import { percentage, round2 } from '../../utils/math.util';
import {
  DataQualityReport,
  IMetricsCollector,
  MetricEntry,
  MetricsSummary,
  PipelineRunSummary
} from './metrics-collector.interface';

export interface MetricsOptions {
  filePath?: string;     // JSON Lines output; history stays in memory when unset
  maxHistory?: number;   // oldest entries are dropped beyond this
}

export const DEFAULT_MAX_METRIC_HISTORY = 1000;

@injectable()
export class SimpleMetricsAdapter implements IMetricsCollector {
  private readonly history: MetricEntry[] = [];

  constructor(@inject('MetricsOptions') private readonly options: MetricsOptions) {}

  async recordPipelineRun(summary: PipelineRunSummary): Promise<void> {
    const seconds = summary.durationMs / 1000;
    await this.record({
      metricType: 'pipeline_run',
      timestamp: new Date().toISOString(),
      ...summary,
      throughputRecordsPerSecond: seconds > 0 ? round2(summary.totalRows / seconds) : 0
    });
  }

  async recordBusinessMetrics(metrics: BusinessMetrics): Promise<void> {
    if (metrics.totalShipments === 0) return;
    await this.record({
      metricType: 'business_metrics',
      timestamp: new Date().toISOString(),
      ...metrics
    });
  }

  async recordDataQuality(report: DataQualityReport): Promise<void> {
    await this.record({
      metricType: 'data_quality',
      timestamp: new Date().toISOString(),
      ...report,
      dataQualityRate: percentage(report.validRecords, report.totalRecords),
      errorRate: percentage(report.invalidRecords, report.totalRecords)
    });
  }

  getMetricsSummary(): MetricsSummary {
    const ofType = (type: MetricEntry['metricType']) => this.history.filter(entry => entry.metricType === type);
    const pipelineRuns = ofType('pipeline_run');
    const businessMetrics = ofType('business_metrics');
    const dataQuality = ofType('data_quality');

    return {
      totalMetricsCollected: this.history.length,
      pipelineRunsCount: pipelineRuns.length,
      businessMetricsCount: businessMetrics.length,
      dataQualityMetricsCount: dataQuality.length,
      latestPipelineRun: pipelineRuns[pipelineRuns.length - 1],
      latestBusinessMetrics: businessMetrics[businessMetrics.length - 1],
      latestDataQuality: dataQuality[dataQuality.length - 1]
    };
  }

  private async record(entry: MetricEntry): Promise<void> {
    this.history.push(entry);
    const overflow = this.history.length - (this.options.maxHistory ?? DEFAULT_MAX_METRIC_HISTORY);
    if (overflow > 0) {
      this.history.splice(0, overflow);
    }
    console.log(`[Metrics] ${entry.metricType}: ${JSON.stringify(entry)}`);

    if (!this.options.filePath) return;
    try {
      await appendFile(this.options.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error(`[Metrics] Failed to write metric to ${this.options.filePath}:`, error);
    }
  }
}

import "reflect-metadata";
import express from "express";
import cors from "cors";
import { container } from "tsyringe";
import { z } from "zod";
import { AppConfig, loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IMetricsCollector } from "./adapters/metrics/metrics-collector.interface";
import { IShipmentAnalytics } from "./services/shipment-analytics.interface";
import { IShipmentEtlService } from "./services/shipment-etl.interface";
import { isSuccess } from "./types/result.types";

const RunRequestSchema = z.object({
  source: z.string().min(1).optional(),
  destination: z.string().min(1).optional(),
  batchId: z.string().regex(/^[\w.-]+$/, "must contain only letters, digits, '_', '.' or '-'").optional(),
  prefix: z.string().optional(),
  formats: z.array(z.enum(["csv", "jsonl", "parquet"])).min(1).optional(),
  dryRun: z.boolean().optional(),
});

const AnalyticsRequestSchema = z.object({
  source: z.string().min(1).optional(),
  limit: z.number().int().positive().optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join(", ");
}

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// Initialize DI container (same as index.ts)
const config: AppConfig = loadConfig();
setupDI(config);

// POST /api/pipeline/run - Run one ETL batch
app.post("/api/pipeline/run", async (req, res) => {
  const parsed = RunRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({
      success: false,
      error: `Invalid request. ${describeIssues(parsed.error)}`,
    });
  }

  try {
    const { source, destination, ...options } = parsed.data;
    const etl = container.resolve<IShipmentEtlService>("IShipmentEtlService");

    const run = await etl.processShipments(
      source ?? config.data.sourcePath,
      destination ?? config.storage.bucket,
      options
    );

    res.status(run.success ? 200 : 502).json(run);
  } catch (error) {
    console.error("Pipeline error:", error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
});

// POST /api/analytics - Business insights over the valid shipments of a source
app.post("/api/analytics", async (req, res) => {
  const parsed = AnalyticsRequestSchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    return res.status(400).json({
      success: false,
      error: `Invalid request. ${describeIssues(parsed.error)}`,
    });
  }

  try {
    const source = parsed.data.source ?? config.data.sourcePath;
    const etl = container.resolve<IShipmentEtlService>("IShipmentEtlService");
    const analytics = container.resolve<IShipmentAnalytics>("IShipmentAnalytics");

    const result = await etl.extractValidShipments(source);
    if (!isSuccess(result)) {
      return res.status(422).json({ success: false, error: result.message });
    }

    const { shipments, totalRows, errors } = result.data;
    res.json({
      success: true,
      source,
      totalRows,
      validCount: shipments.length,
      errorCount: errors.length,
      insights: analytics.generateBusinessInsights(shipments),
      mostProfitableRoutes: analytics.mostProfitableRoutes(shipments, parsed.data.limit),
    });
  } catch (error) {
    console.error("Analytics error:", error);
    res.status(500).json({
      success: false,
      error: error instanceof Error ? error.message : "Unknown error occurred",
    });
  }
});

// GET /api/metrics - Collected metrics for this process
app.get("/api/metrics", (req, res) => {
  if (!config.metrics.enabled) {
    return res.status(404).json({ success: false, error: "Metrics are disabled" });
  }
  const metrics = container.resolve<IMetricsCollector>("IMetricsCollector");
  res.json(metrics.getMetricsSummary());
});

// Health check endpoint
app.get("/health", (req, res) => {
  res.json({
    status: "ok",
    storageBackend: config.storage.backend,
    formats: config.storage.formats,
  });
});

app.listen(config.api.port, () => {
  console.log(`API Server running on http://localhost:${config.api.port}`);
  console.log(`Health check: http://localhost:${config.api.port}/health`);
});

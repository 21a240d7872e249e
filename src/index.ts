#!/usr/bin/env node
import "reflect-metadata";
import { container } from "tsyringe";
import { AppConfig, loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IShipmentAnalytics } from "./services/shipment-analytics.interface";
import { IShipmentEtlService } from "./services/shipment-etl.interface";
import { isSuccess } from "./types/result.types";

const USAGE = `Usage:
  run [source] [destination] [--dry-run]   Run the ETL pipeline
  analyze [source]                         Print business insights for valid shipments`;

async function runPipeline(config: AppConfig, args: string[]): Promise<number> {
  const dryRun = args.includes("--dry-run");
  const [source = config.data.sourcePath, destination = config.storage.bucket] =
    args.filter((arg) => !arg.startsWith("--"));

  const etl = container.resolve<IShipmentEtlService>("IShipmentEtlService");
  const run = await etl.processShipments(source, destination, { dryRun });

  console.log("\nPipeline Run (JSON):");
  console.log(JSON.stringify(run, null, 2));
  return run.success ? 0 : 1;
}

async function analyze(config: AppConfig, args: string[]): Promise<number> {
  const source = args[0] ?? config.data.sourcePath;

  const etl = container.resolve<IShipmentEtlService>("IShipmentEtlService");
  const analytics = container.resolve<IShipmentAnalytics>("IShipmentAnalytics");

  const result = await etl.extractValidShipments(source);
  if (!isSuccess(result)) {
    console.error(`Analysis failed: ${result.message}`);
    return 1;
  }
  console.log(result.message);

  const insights = analytics.generateBusinessInsights(result.data.shipments);
  console.log("\nBusiness Insights (JSON):");
  console.log(JSON.stringify(insights, null, 2));
  return 0;
}

async function main() {
  try {
    const [command = "run", ...args] = process.argv.slice(2);

    const config = loadConfig();
    setupDI(config);

    let exitCode: number;
    switch (command) {
      case "run":
        exitCode = await runPipeline(config, args);
        break;
      case "analyze":
        exitCode = await analyze(config, args);
        break;
      default:
        console.error(`Unknown command: ${command}\n${USAGE}`);
        exitCode = 2;
    }
    process.exit(exitCode);
  } catch (error) {
    console.error("Fatal error:", error);
    process.exit(1);
  }
}

main();

import { pathToFileURL } from "node:url";
import cron from "node-cron";
import { config, isEmailConfigured } from "./config.js";
import type { Services } from "./container.js";
import { timestamp } from "./log.js";

async function ingest(services: Services): Promise<void> {
  if (services.ingestor.isRunning) {
    console.log(`[${timestamp()}] Ingest cycle already running, joining it.`);
  }
  try {
    await services.ingestor.runCycle();
  } catch (err) {
    console.error(`[${timestamp()}] Ingest cycle failed:`, (err as Error).message);
  }
}

async function dailySummary(services: Services): Promise<void> {
  console.log(`[${timestamp()}] Sending daily summaries`);
  try {
    await services.notifier.sendDailySummaries(new Date());
  } catch (err) {
    console.error(`[${timestamp()}] Daily summaries failed:`, (err as Error).message);
  }
}

export function startScheduler(services: Services): () => void {
  console.log("Crypto Price Ingest Scheduler");
  console.log("=============================");
  console.log(`Ingest:        ${config.ingestCron}`);
  console.log(`Daily summary: ${config.dailySummaryCron}`);
  console.log(`Stale after:   ${config.cacheStaleMinutes} minutes`);
  console.log(`Email:         ${isEmailConfigured() ? "configured" : "not configured"}`);
  console.log();

  // Run immediately on start
  void ingest(services);

  const tasks = [
    cron.schedule(config.ingestCron, () => {
      void ingest(services);
    }),
    cron.schedule(config.dailySummaryCron, () => {
      void dailySummary(services);
    }),
  ];

  console.log("Scheduler running.\n");
  return () => {
    for (const task of tasks) task.stop();
  };
}

// Standalone: npm run scheduler
const entryPoint = process.argv[1];
if (entryPoint && import.meta.url === pathToFileURL(entryPoint).href) {
  const { openServices } = await import("./container.js");
  const { services } = await openServices();
  startScheduler(services);
}

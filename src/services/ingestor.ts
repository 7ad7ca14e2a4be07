import { UpstreamError } from "../errors.js";
import { timestamp } from "../log.js";
import type { AlertEvent, AssetQuote } from "../types.js";
import { describeRecord, parseAssetRecord } from "./market-data.js";
import type { MarketDataSource } from "./market-data.js";
import type { PriceCache } from "./price-cache.js";

export interface AlertSink {
  dispatchAlerts(events: AlertEvent[]): Promise<unknown>;
}

export type CycleStatus = "committed" | "abandoned" | "rejected";

export interface CycleReport {
  status: CycleStatus;
  attempts: number;
  received: number;
  valid: number;
  malformed: number;
  inserted: number;
  updated: number;
  stale: number;
  failed: number;
  alerts: number;
  error?: string;
}

export interface IngestorOptions {
  limit?: number;
  deadlineMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  backoffMaxMs?: number;
  requestTimeoutMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class Ingestor {
  private running: Promise<CycleReport> | null = null;
  private readonly limit: number;
  private readonly deadlineMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly backoffMaxMs: number;
  private readonly requestTimeoutMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly cache: PriceCache,
    private readonly source: MarketDataSource,
    private readonly alerts: AlertSink | null = null,
    options: IngestorOptions = {},
  ) {
    this.limit = options.limit ?? 100;
    this.deadlineMs = options.deadlineMs ?? 60_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.backoffMs = options.backoffMs ?? 1000;
    this.backoffMaxMs = options.backoffMaxMs ?? 30_000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get isRunning(): boolean {
    return this.running !== null;
  }

  /** Joins the cycle already in flight instead of starting a second one. */
  runCycle(): Promise<CycleReport> {
    if (!this.running) {
      this.running = this.cycle().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  /** Runs a cycle only when the cache is stale; resolves to null when it was fresh. */
  async refreshIfStale(): Promise<CycleReport | null> {
    if (this.running) return this.running;
    if (!(await this.cache.isStale())) return null;
    return this.runCycle();
  }

  private async cycle(): Promise<CycleReport> {
    const report: CycleReport = {
      status: "committed",
      attempts: 0,
      received: 0,
      valid: 0,
      malformed: 0,
      inserted: 0,
      updated: 0,
      stale: 0,
      failed: 0,
      alerts: 0,
    };
    const deadline = this.now() + this.deadlineMs;

    const records = await this.fetchWithRetry(report, deadline);
    if (!records) return this.finish(report);
    report.received = records.length;

    const fetchedAt = new Date(this.now());
    const quotes: AssetQuote[] = [];
    for (const raw of records) {
      const quote = parseAssetRecord(raw, fetchedAt);
      if (quote) {
        quotes.push(quote);
      } else {
        report.malformed++;
        console.warn(`  Skipping malformed record (${describeRecord(raw)})`);
      }
    }
    report.valid = quotes.length;

    if (quotes.length === 0) {
      report.status = "rejected";
      report.error = "No valid records in upstream response";
      return this.finish(report);
    }

    for (const quote of quotes) {
      let emitted: AlertEvent[];
      try {
        const outcome = await this.cache.upsert(quote);
        report[outcome.status]++;
        emitted = outcome.alerts;
      } catch (err) {
        report.failed++;
        console.error(`  Upsert of ${quote.symbol} (${quote.assetId}) failed:`, (err as Error).message);
        continue;
      }

      report.alerts += emitted.length;
      if (emitted.length > 0 && this.alerts) {
        try {
          await this.alerts.dispatchAlerts(emitted);
        } catch (err) {
          console.error(`  Alert delivery for ${quote.symbol} failed:`, (err as Error).message);
        }
      }
    }

    return this.finish(report);
  }

  private async fetchWithRetry(report: CycleReport, deadline: number): Promise<unknown[] | null> {
    for (let attempt = 0; ; attempt++) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        report.status = "abandoned";
        report.error = "Cycle deadline passed";
        return null;
      }

      report.attempts++;
      try {
        return await this.source.fetchTopAssets(
          this.limit,
          AbortSignal.timeout(Math.min(this.requestTimeoutMs, remaining)),
        );
      } catch (err) {
        const message = (err as Error).message;
        const retryable = err instanceof UpstreamError ? err.retryable : true;
        if (!retryable || attempt >= this.maxRetries) {
          report.status = "abandoned";
          report.error = message;
          return null;
        }

        const delay = Math.min(this.backoffMs * 2 ** attempt, this.backoffMaxMs);
        if (this.now() + delay > deadline) {
          report.status = "abandoned";
          report.error = `${message} (no time left to retry before the cycle deadline)`;
          return null;
        }

        console.warn(`  Market data fetch failed (${message}), retrying in ${delay}ms`);
        await this.sleep(delay);
      }
    }
  }

  private finish(report: CycleReport): CycleReport {
    const counts =
      `received=${report.received} valid=${report.valid} malformed=${report.malformed} ` +
      `inserted=${report.inserted} updated=${report.updated} stale=${report.stale} ` +
      `failed=${report.failed} alerts=${report.alerts} attempts=${report.attempts}`;

    if (report.status === "committed") {
      console.log(`[${timestamp()}] Ingest cycle committed: ${counts}`);
    } else {
      console.error(`[${timestamp()}] Ingest cycle ${report.status}: ${report.error} (${counts})`);
    }
    return report;
  }
}

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { UpstreamError } from "../src/errors.js";
import { SERVICE_PRINCIPAL } from "../src/services/access.js";
import type { MarketDataSource } from "../src/services/market-data.js";
import type { AlertEvent } from "../src/types.js";
import { createTestEnv, rawRecord, StaticSource } from "./support/fixtures.js";
import type { TestEnv } from "./support/fixtures.js";

/** Fails with each queued error in turn, then returns `records`. */
class FlakySource implements MarketDataSource {
  calls = 0;

  constructor(
    private readonly failures: Error[],
    private readonly records: unknown[] = [rawRecord(1, 100)],
  ) {}

  async fetchTopAssets(): Promise<unknown[]> {
    const failure = this.failures[this.calls++];
    if (failure) throw failure;
    return this.records;
  }
}

/** Holds every fetch open until `release` is called. */
class GatedSource implements MarketDataSource {
  calls = 0;
  private pending: Array<(records: unknown[]) => void> = [];

  async fetchTopAssets(): Promise<unknown[]> {
    this.calls++;
    return new Promise((resolve) => this.pending.push(resolve));
  }

  release(records: unknown[]): void {
    for (const resolve of this.pending.splice(0)) resolve(records);
  }
}

const unavailable = () => new UpstreamError("Market data request returned 503", true, 503);

function flushCallbacks(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("Ingestor", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes every valid record and counts malformed ones", async () => {
    const records: unknown[] = [];
    for (let id = 1; id <= 7; id++) records.push(rawRecord(id, id * 10));
    records.push(rawRecord(8, 10, { PRICE_USD: "cheap" }), rawRecord(9, -4), { SYMBOL: "NOID" });
    const env = createTestEnv({ source: new StaticSource(records) });

    const report = await env.services.ingestor.runCycle();

    expect(report).toEqual({
      status: "committed",
      attempts: 1,
      received: 10,
      valid: 7,
      malformed: 3,
      inserted: 7,
      updated: 0,
      stale: 0,
      failed: 0,
      alerts: 0,
    });
    expect(env.store.tables.assets.size).toBe(7);
    expect((await env.services.cache.get(3))?.symbol).toBe("C3");
  });

  it("counts repeated upstream timestamps as stale on the next cycle", async () => {
    const env = createTestEnv({ source: new StaticSource([rawRecord(1, 100), rawRecord(2, 200)]) });

    await env.services.ingestor.runCycle();
    const second = await env.services.ingestor.runCycle();

    expect(second.stale).toBe(2);
    expect(second.inserted).toBe(0);
  });

  it("rejects a cycle with no valid records and writes nothing", async () => {
    const env = createTestEnv({ source: new StaticSource([{ ID: "x" }, null]) });

    const report = await env.services.ingestor.runCycle();

    expect(report.status).toBe("rejected");
    expect(report.malformed).toBe(2);
    expect(env.store.tables.assets.size).toBe(0);
  });

  it("retries unavailability with exponential backoff", async () => {
    const sleeps: number[] = [];
    const source = new FlakySource([unavailable(), new Error("socket hang up")]);
    const env = createTestEnv({ source, ingest: { sleep: async (ms) => void sleeps.push(ms) } });

    const report = await env.services.ingestor.runCycle();

    expect(report.status).toBe("committed");
    expect(report.attempts).toBe(3);
    expect(sleeps).toEqual([1000, 2000]);
    expect(env.store.tables.assets.size).toBe(1);
  });

  it("abandons immediately on a non-retryable upstream error", async () => {
    const sleeps: number[] = [];
    const source = new FlakySource([new UpstreamError("Market data request returned 401", false, 401)]);
    const env = createTestEnv({ source, ingest: { sleep: async (ms) => void sleeps.push(ms) } });

    const report = await env.services.ingestor.runCycle();

    expect(report.status).toBe("abandoned");
    expect(report.error).toBe("Market data request returned 401");
    expect(report.attempts).toBe(1);
    expect(sleeps).toEqual([]);
  });

  it("gives up after the configured number of retries", async () => {
    const source = new FlakySource([unavailable(), unavailable(), unavailable(), unavailable()]);
    const env = createTestEnv({ source, ingest: { maxRetries: 2 } });

    const report = await env.services.ingestor.runCycle();

    expect(report.status).toBe("abandoned");
    expect(report.attempts).toBe(3);
    expect(source.calls).toBe(3);
  });

  it("abandons the cycle when a retry would pass the deadline, leaving the cache unchanged", async () => {
    const source = new FlakySource(Array.from({ length: 10 }, unavailable));
    const env = createTestEnv({ source, ingest: { deadlineMs: 1500, backoffMs: 1000 } });

    const report = await env.services.ingestor.runCycle();

    expect(report.status).toBe("abandoned");
    expect(report.attempts).toBe(2);
    expect(report.error).toContain("cycle deadline");
    expect(env.store.tables.assets.size).toBe(0);
  });

  it("shares one running cycle between concurrent callers", async () => {
    const source = new GatedSource();
    const env = createTestEnv({ source });

    const first = env.services.ingestor.runCycle();
    const second = env.services.ingestor.runCycle();
    expect(second).toBe(first);
    expect(env.services.ingestor.isRunning).toBe(true);

    await flushCallbacks();
    source.release([rawRecord(1, 100)]);
    await first;

    expect(source.calls).toBe(1);
    expect(env.services.ingestor.isRunning).toBe(false);

    const third = env.services.ingestor.runCycle();
    await flushCallbacks();
    source.release([rawRecord(1, 100)]);
    await third;
    expect(source.calls).toBe(2);
  });

  it("refreshes a stale cache once for concurrent readers and skips a fresh one", async () => {
    const source = new GatedSource();
    const env = createTestEnv({ source });

    const readers = Promise.all([
      env.services.ingestor.refreshIfStale(),
      env.services.ingestor.refreshIfStale(),
      env.services.ingestor.refreshIfStale(),
    ]);
    await flushCallbacks();
    source.release([rawRecord(1, 100)]);
    const [a, b, c] = await readers;

    expect(source.calls).toBe(1);
    expect(a?.status).toBe("committed");
    expect(b).toBe(a);
    expect(c).toBe(a);

    expect(await env.services.ingestor.refreshIfStale()).toBeNull();
    expect(source.calls).toBe(1);
  });

  it("counts a failing asset and keeps writing the others", async () => {
    const env = createTestEnv({ source: new StaticSource([rawRecord(1, 10), rawRecord(2, 20), rawRecord(3, 30)]) });
    env.store.faults.upsertAsset = (quote) => quote.assetId === 2;

    const report = await env.services.ingestor.runCycle();

    expect(report.status).toBe("committed");
    expect(report.inserted).toBe(2);
    expect(report.failed).toBe(1);
    expect(await env.services.cache.get(2)).toBeNull();
  });

  describe("alert delivery", () => {
    let env: TestEnv;
    let source: StaticSource;

    beforeEach(async () => {
      source = new StaticSource([rawRecord(1, 100)]);
      env = createTestEnv({ source });
      await env.services.ingestor.runCycle();
      const user = await env.services.accounts.createUser("watcher@example.com");
      await env.services.accounts.addToWatchlist(SERVICE_PRINCIPAL, user.id, 1, 5);
      source.records = [rawRecord(1, 110, { PRICE_USD_LAST_UPDATE_TS: 1767225600 + 120 })];
    });

    it("hands emitted alerts to the dispatcher after each upsert", async () => {
      const dispatched: AlertEvent[][] = [];
      vi.spyOn(env.services.notifier, "dispatchAlerts").mockImplementation(async (events) => {
        dispatched.push(events);
        return { sent: 0, skipped: events.length, failed: 0 };
      });

      const report = await env.services.ingestor.runCycle();

      expect(report.alerts).toBe(1);
      expect(dispatched).toHaveLength(1);
      expect(dispatched[0]?.[0]?.triggerPrice).toBe(110);
    });

    it("never fails the cycle when delivery throws", async () => {
      vi.spyOn(env.services.notifier, "dispatchAlerts").mockRejectedValue(new Error("mail queue full"));

      const report = await env.services.ingestor.runCycle();

      expect(report.status).toBe("committed");
      expect(report.alerts).toBe(1);
      expect(env.store.tables.alerts).toHaveLength(1);
    });
  });
});

import { describe, it, expect, beforeEach } from "vitest";
import { crossesThreshold, evaluateEntry, percentChange } from "../src/services/alert-evaluator.js";
import { SERVICE_PRINCIPAL } from "../src/services/access.js";
import type { User, WatchlistEntry } from "../src/types.js";
import { at, createTestEnv, makeQuote } from "./support/fixtures.js";
import type { TestEnv } from "./support/fixtures.js";

const entry = { referencePrice: 100, thresholdPercent: 5 };

describe("evaluateEntry", () => {
  it("holds just below the threshold", () => {
    const decision = evaluateEntry(entry, 104.9);
    expect(decision.kind).toBe("held");
    if (decision.kind === "held") expect(decision.percentChange).toBeCloseTo(4.9, 10);
  });

  it("crosses exactly at the threshold", () => {
    expect(evaluateEntry(entry, 105)).toEqual({ kind: "crossed", percentChange: 5, direction: "increase" });
  });

  it("crosses downward", () => {
    expect(evaluateEntry(entry, 95)).toEqual({ kind: "crossed", percentChange: -5, direction: "decrease" });
  });

  it("holds when the price is unchanged", () => {
    expect(evaluateEntry(entry, 100)).toEqual({ kind: "held", percentChange: 0 });
  });

  it("treats a drop to zero as a full decrease", () => {
    expect(evaluateEntry(entry, 0)).toEqual({ kind: "crossed", percentChange: -100, direction: "decrease" });
  });

  it("skips entries it cannot divide by", () => {
    expect(evaluateEntry({ referencePrice: 0, thresholdPercent: 5 }, 10).kind).toBe("skipped");
    expect(evaluateEntry({ referencePrice: -3, thresholdPercent: 5 }, 10).kind).toBe("skipped");
    expect(evaluateEntry({ referencePrice: Number.NaN, thresholdPercent: 5 }, 10).kind).toBe("skipped");
  });

  it("skips non-positive thresholds and invalid prices", () => {
    expect(evaluateEntry({ referencePrice: 100, thresholdPercent: 0 }, 200).kind).toBe("skipped");
    expect(evaluateEntry(entry, Number.POSITIVE_INFINITY).kind).toBe("skipped");
  });

  it.each([
    { reference: 0.1, price: 0.105, threshold: 5, change: 5, direction: "increase" },
    { reference: 1.1, price: 1.155, threshold: 5, change: 5, direction: "increase" },
    { reference: 0.07, price: 0.0735, threshold: 5, change: 5, direction: "increase" },
    { reference: 1.1, price: 1.045, threshold: 5, change: -5, direction: "decrease" },
    { reference: 0.3, price: 0.27, threshold: 10, change: -10, direction: "decrease" },
  ])("crosses on a decimal move of exactly $threshold% ($reference -> $price)", ({ reference, price, threshold, change, direction }) => {
    expect(evaluateEntry({ referencePrice: reference, thresholdPercent: threshold }, price)).toEqual({
      kind: "crossed",
      percentChange: change,
      direction,
    });
  });

  it("holds one price unit short of a decimal threshold", () => {
    expect(crossesThreshold(0.1, 0.10499999, 5)).toBe(false);
    expect(crossesThreshold(0.1, 0.105, 5)).toBe(true);
    expect(crossesThreshold(0.3, 0.27000001, 10)).toBe(false);
  });

  it("computes percent change against the reference", () => {
    expect(percentChange(200, 150)).toBe(-25);
    expect(percentChange(0.5, 0.55)).toBeCloseTo(10, 10);
  });
});

describe("AlertEvaluator", () => {
  let env: TestEnv;
  let user: User;
  let watched: WatchlistEntry;

  beforeEach(async () => {
    env = createTestEnv();
    await env.services.cache.upsert(makeQuote({ price: 100, upstreamUpdatedAt: at(0) }));
    user = await env.services.accounts.createUser("trader@example.com");
    watched = await env.services.accounts.addToWatchlist(SERVICE_PRINCIPAL, user.id, 1, 5);
  });

  async function price(value: number, second: number) {
    return env.services.cache.upsert(makeQuote({ price: value, upstreamUpdatedAt: at(second) }));
  }

  async function referencePrice(): Promise<number | undefined> {
    return (await env.store.getWatchlistEntry(user.id, 1))?.referencePrice;
  }

  it("initializes the reference price from the current snapshot", () => {
    expect(watched.referencePrice).toBe(100);
  });

  it("is edge-triggered: the reference moves only when an alert fires", async () => {
    const below = await price(104.9, 1);
    expect(below.alerts).toEqual([]);
    expect(await referencePrice()).toBe(100);

    const crossed = await price(105, 2);
    expect(crossed.alerts).toHaveLength(1);
    expect(crossed.alerts[0]).toMatchObject({
      userId: user.id,
      assetId: 1,
      symbol: "BTC",
      triggerPrice: 105,
      percentChange: 5,
      direction: "increase",
    });
    expect(await referencePrice()).toBe(105);

    const drift = await price(106, 3);
    expect(drift.alerts).toEqual([]);
    expect(await referencePrice()).toBe(105);

    const down = await price(99.75, 4);
    expect(down.alerts).toHaveLength(1);
    expect(down.alerts[0]?.direction).toBe("decrease");
    expect(down.alerts[0]?.percentChange).toBe(-5);
    expect(await referencePrice()).toBe(99.75);
  });

  it("appends each emitted alert to the log", async () => {
    await price(105, 1);
    env.clock.advance(1000);
    await price(99.75, 2);

    const history = await env.services.alertLog.listFor(user.id);
    expect(history.map((a) => a.direction)).toEqual(["decrease", "increase"]);
    expect(env.services.evaluator.stats.emitted).toBe(2);
  });

  it("emits nothing for a stale write", async () => {
    await price(105, 10);
    const stale = await price(200, 5);

    expect(stale.status).toBe("stale");
    expect(stale.alerts).toEqual([]);
    expect(await env.services.alertLog.listFor(user.id)).toHaveLength(1);
  });

  it("evaluates every watcher of the asset independently", async () => {
    const other = await env.services.accounts.createUser("other@example.com");
    await env.services.accounts.addToWatchlist(SERVICE_PRINCIPAL, other.id, 1, 20);

    const outcome = await price(110, 1);

    expect(outcome.alerts.map((a) => a.userId)).toEqual([user.id]);
    expect(env.services.evaluator.stats.evaluated).toBe(2);
  });

  it("isolates a failing entry and keeps evaluating the rest", async () => {
    const other = await env.services.accounts.createUser("other@example.com");
    await env.services.accounts.addToWatchlist(SERVICE_PRINCIPAL, other.id, 1, 5);
    env.store.faults.updateReferencePrice = (id) => id === watched.id;

    const outcome = await price(110, 1);

    expect(outcome.status).toBe("updated");
    expect(outcome.alerts.map((a) => a.userId)).toEqual([other.id]);
    expect(await env.services.alertLog.listFor(user.id)).toEqual([]);
    expect(await referencePrice()).toBe(100);
    expect((await env.store.getWatchlistEntry(other.id, 1))?.referencePrice).toBe(110);
    expect(env.services.evaluator.stats.faults).toBe(1);
  });

  it("keeps the price update when the whole evaluation fails", async () => {
    env.store.faults.lockWatchersOf = () => true;

    const outcome = await price(150, 1);

    expect(outcome.status).toBe("updated");
    expect(outcome.alerts).toEqual([]);
    expect((await env.services.cache.get(1))?.price).toBe(150);
    expect(env.services.evaluator.stats.faults).toBe(1);
  });

  it("skips an entry with a zero reference price instead of dividing by it", async () => {
    await env.services.cache.upsert(makeQuote({ assetId: 7, symbol: "ZERO", name: "Zero", price: 0 }));
    await env.services.accounts.addToWatchlist(SERVICE_PRINCIPAL, user.id, 7, 5);

    const outcome = await env.services.cache.upsert(
      makeQuote({ assetId: 7, symbol: "ZERO", name: "Zero", price: 10, upstreamUpdatedAt: at(1) }),
    );

    expect(outcome.alerts).toEqual([]);
    expect(env.services.evaluator.stats.skipped).toBe(1);
  });

  it("evaluates and stores the price rounded to the cached scale", async () => {
    const outcome = await price(105.000000004, 1);

    expect(outcome.alerts[0]?.triggerPrice).toBe(105);
    expect(await referencePrice()).toBe(105);
    expect((await env.services.cache.get(1))?.price).toBe(105);
  });

  it("stamps alerts with the display fields synced from the same update", async () => {
    const outcome = await env.services.cache.upsert(
      makeQuote({ symbol: "XBT", name: "Bitcoin (renamed)", price: 120, upstreamUpdatedAt: at(1) }),
    );

    expect(outcome.alerts[0]?.symbol).toBe("XBT");
    expect(outcome.alerts[0]?.name).toBe("Bitcoin (renamed)");
  });
});

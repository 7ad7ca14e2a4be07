import { randomUUID } from "node:crypto";
import type { Store } from "../store.js";
import type { AlertDirection, AlertEvent, AssetSnapshot, WatchlistEntry } from "../types.js";
import type { AlertLog } from "./alert-log.js";
import type { SnapshotListener } from "./price-cache.js";

export type EntryDecision =
  | { kind: "crossed"; percentChange: number; direction: AlertDirection }
  | { kind: "held"; percentChange: number }
  | { kind: "skipped"; reason: string };

export function percentChange(referencePrice: number, price: number): number {
  return ((price - referencePrice) * 100) / referencePrice;
}

// Prices are compared in units of 1e-8 and thresholds in units of 1e-4 percent.
const PRICE_UNITS = 100_000_000;
const THRESHOLD_UNITS = 10_000;

/** Exact `|price - ref| / ref * 100 >= threshold`, free of binary rounding. */
export function crossesThreshold(referencePrice: number, price: number, thresholdPercent: number): boolean {
  const ref = BigInt(Math.round(referencePrice * PRICE_UNITS));
  const now = BigInt(Math.round(price * PRICE_UNITS));
  const threshold = BigInt(Math.round(thresholdPercent * THRESHOLD_UNITS));
  const move = now > ref ? now - ref : ref - now;
  return move > 0n && move * 100n * BigInt(THRESHOLD_UNITS) >= threshold * ref;
}

function roundPercent(value: number): number {
  return Math.round(value * 10_000) / 10_000 || 0;
}

/**
 * Decides whether a move from the entry's reference price to `price` crosses
 * its threshold. Equal to the threshold counts as crossed.
 */
export function evaluateEntry(
  entry: Pick<WatchlistEntry, "referencePrice" | "thresholdPercent">,
  price: number,
): EntryDecision {
  if (!Number.isFinite(entry.referencePrice) || entry.referencePrice <= 0) {
    return { kind: "skipped", reason: `reference price ${entry.referencePrice} is not positive` };
  }
  if (!Number.isFinite(entry.thresholdPercent) || entry.thresholdPercent <= 0) {
    return { kind: "skipped", reason: `threshold ${entry.thresholdPercent}% is not positive` };
  }
  if (!Number.isFinite(price) || price < 0) {
    return { kind: "skipped", reason: `price ${price} is invalid` };
  }

  const change = roundPercent(percentChange(entry.referencePrice, price));
  if (crossesThreshold(entry.referencePrice, price, entry.thresholdPercent)) {
    return { kind: "crossed", percentChange: change, direction: price > entry.referencePrice ? "increase" : "decrease" };
  }
  return { kind: "held", percentChange: change };
}

export interface EvaluatorStats {
  evaluated: number;
  emitted: number;
  skipped: number;
  faults: number;
}

/**
 * Evaluates every watchlist entry of an updated asset. Runs inside the
 * snapshot transaction, after display fields have been synced.
 *
 * Never throws: faults are rolled back to a savepoint, logged and counted,
 * so a bad entry cannot fail its siblings or the snapshot write.
 */
export class AlertEvaluator implements SnapshotListener {
  readonly name = "alert-evaluator";
  readonly stats: EvaluatorStats = { evaluated: 0, emitted: 0, skipped: 0, faults: 0 };

  constructor(
    private readonly alertLog: AlertLog,
    private readonly now: () => number = Date.now,
  ) {}

  async onSnapshot(tx: Store, snapshot: AssetSnapshot): Promise<AlertEvent[]> {
    try {
      return await tx.savepoint("evaluate_asset", (sp) => this.evaluateAsset(sp, snapshot));
    } catch (err) {
      this.stats.faults++;
      console.error(`  Alert evaluation for asset ${snapshot.assetId} failed:`, (err as Error).message);
      return [];
    }
  }

  private async evaluateAsset(tx: Store, snapshot: AssetSnapshot): Promise<AlertEvent[]> {
    const entries = await tx.lockWatchersOf(snapshot.assetId);
    const emitted: AlertEvent[] = [];

    for (const entry of entries) {
      this.stats.evaluated++;
      try {
        const decision = evaluateEntry(entry, snapshot.price);

        if (decision.kind === "skipped") {
          this.stats.skipped++;
          console.warn(`  Skipping watchlist entry ${entry.id} (${entry.symbol}): ${decision.reason}`);
          continue;
        }
        if (decision.kind === "held") continue;

        const event: AlertEvent = {
          id: randomUUID(),
          userId: entry.userId,
          assetId: entry.assetId,
          symbol: entry.symbol,
          name: entry.name,
          logoUrl: entry.logoUrl,
          triggerPrice: snapshot.price,
          percentChange: decision.percentChange,
          direction: decision.direction,
          createdAt: new Date(this.now()).toISOString(),
        };

        await tx.savepoint("evaluate_entry", async (sp) => {
          await this.alertLog.append(sp, event);
          await sp.updateReferencePrice(entry.id, snapshot.price);
        });

        this.stats.emitted++;
        emitted.push(event);
      } catch (err) {
        this.stats.faults++;
        console.error(`  Alert evaluation for watchlist entry ${entry.id} failed:`, (err as Error).message);
      }
    }

    return emitted;
  }
}

import { randomUUID } from "node:crypto";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import type { Store } from "../store.js";
import type { AssetSnapshot, DisplayFields, WatchlistEntry } from "../types.js";
import type { SnapshotListener } from "./price-cache.js";

export const DEFAULT_THRESHOLD_PERCENT = 5;
export const MAX_THRESHOLD_PERCENT = 1000;

export function validateThreshold(thresholdPercent: number): void {
  if (!Number.isFinite(thresholdPercent) || thresholdPercent <= 0 || thresholdPercent > MAX_THRESHOLD_PERCENT) {
    throw new ValidationError(`Alert threshold must be greater than 0 and at most ${MAX_THRESHOLD_PERCENT} percent`);
  }
}

export class WatchlistStore implements SnapshotListener {
  readonly name = "watchlist-display-sync";

  constructor(
    private readonly store: Store,
    private readonly now: () => number = Date.now,
  ) {}

  async add(userId: string, assetId: number, thresholdPercent = DEFAULT_THRESHOLD_PERCENT): Promise<WatchlistEntry> {
    validateThreshold(thresholdPercent);

    return this.store.transaction(async (tx) => {
      const snapshot = await tx.getAsset(assetId);
      if (!snapshot) throw new NotFoundError(`Asset ${assetId} is not tracked`);

      const entry: WatchlistEntry = {
        id: randomUUID(),
        userId,
        assetId,
        symbol: snapshot.symbol,
        name: snapshot.name,
        logoUrl: snapshot.logoUrl,
        thresholdPercent,
        referencePrice: snapshot.price,
        createdAt: new Date(this.now()).toISOString(),
      };

      const inserted = await tx.insertWatchlistEntry(entry);
      if (!inserted) throw new ConflictError(`You are already watching ${snapshot.symbol}`);
      return entry;
    });
  }

  remove(userId: string, assetId: number): Promise<WatchlistEntry | null> {
    return this.store.deleteWatchlistEntry(userId, assetId);
  }

  /** Ordered by asset id. */
  listFor(userId: string): Promise<WatchlistEntry[]> {
    return this.store.listWatchlist(userId);
  }

  get(userId: string, assetId: number): Promise<WatchlistEntry | null> {
    return this.store.getWatchlistEntry(userId, assetId);
  }

  /** Changes the threshold only; the reference price keeps accumulating drift. */
  async updateThreshold(userId: string, assetId: number, thresholdPercent: number): Promise<WatchlistEntry> {
    validateThreshold(thresholdPercent);
    const entry = await this.store.updateThreshold(userId, assetId, thresholdPercent);
    if (!entry) throw new NotFoundError(`Asset ${assetId} is not on your watchlist`);
    return entry;
  }

  /** Idempotent; leaves thresholds and reference prices alone. */
  syncDisplayFields(assetId: number, fields: DisplayFields, tx: Store = this.store): Promise<number> {
    return tx.updateDisplayFields(assetId, fields);
  }

  async onSnapshot(tx: Store, snapshot: AssetSnapshot): Promise<void> {
    await this.syncDisplayFields(
      snapshot.assetId,
      { symbol: snapshot.symbol, name: snapshot.name, logoUrl: snapshot.logoUrl },
      tx,
    );
  }
}

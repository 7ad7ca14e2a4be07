import { ValidationError } from "../errors.js";
import { KeyedMutex } from "../keyed-mutex.js";
import type { Store } from "../store.js";
import type { AlertEvent, AssetQuote, AssetSnapshot } from "../types.js";

export const DEFAULT_STALE_MS = 5 * 60 * 1000;
export const PRICE_DECIMALS = 8;
export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 500;

/**
 * Reacts to an accepted snapshot write inside the writing transaction.
 * Returned alert events are handed back to the caller of `upsert` once the
 * transaction has committed.
 */
export interface SnapshotListener {
  readonly name: string;
  onSnapshot(tx: Store, snapshot: AssetSnapshot): Promise<AlertEvent[] | void>;
}

export type UpsertOutcome =
  | { status: "inserted" | "updated"; snapshot: AssetSnapshot; alerts: AlertEvent[] }
  | { status: "stale"; assetId: number; alerts: AlertEvent[] };

export interface PriceCacheOptions {
  staleMs?: number;
  now?: () => number;
}

export class PriceCache {
  private readonly listeners: SnapshotListener[] = [];
  private readonly locks = new KeyedMutex<number>();
  private readonly staleMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: Store,
    options: PriceCacheOptions = {},
  ) {
    this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
    this.now = options.now ?? Date.now;
  }

  /** Listeners run in subscription order. */
  subscribe(listener: SnapshotListener): () => void {
    this.listeners.push(listener);
    return () => {
      const i = this.listeners.indexOf(listener);
      if (i >= 0) this.listeners.splice(i, 1);
    };
  }

  /**
   * Without an id: whether the newest cache write across all assets is older
   * than the staleness window (an empty cache is stale). With an id: the same
   * test for that asset alone.
   */
  async isStale(assetId?: number): Promise<boolean> {
    const latest = await this.store.latestCacheWrite(assetId);
    if (!latest) return true;
    return this.now() - Date.parse(latest) > this.staleMs;
  }

  get(assetId: number): Promise<AssetSnapshot | null> {
    return this.store.getAsset(assetId);
  }

  list(limit = DEFAULT_LIST_LIMIT): Promise<AssetSnapshot[]> {
    const count = Number.isFinite(limit) ? Math.min(Math.max(Math.trunc(limit), 1), MAX_LIST_LIMIT) : DEFAULT_LIST_LIMIT;
    return this.store.listAssets(count);
  }

  search(query: string, limit = 20): Promise<AssetSnapshot[]> {
    return this.store.searchAssets(query, limit);
  }

  async upsert(input: AssetQuote): Promise<UpsertOutcome> {
    validateQuote(input);
    const quote = normalizeQuote(input);

    return this.locks.run(quote.assetId, () =>
      this.store.transaction(async (tx): Promise<UpsertOutcome> => {
        const written = await tx.upsertAsset(quote, new Date(this.now()).toISOString());
        if (!written) return { status: "stale", assetId: quote.assetId, alerts: [] };

        const alerts: AlertEvent[] = [];
        for (const listener of this.listeners) {
          const emitted = await listener.onSnapshot(tx, written.snapshot);
          if (emitted) alerts.push(...emitted);
        }

        return {
          status: written.inserted ? "inserted" : "updated",
          snapshot: written.snapshot,
          alerts,
        };
      }),
    );
  }
}

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

function roundOptional(value: number | null, decimals: number): number | null {
  return value == null ? null : roundTo(value, decimals);
}

/** Rounds figures to the scale of their stored columns so a write reads back unchanged. */
export function normalizeQuote(quote: AssetQuote): AssetQuote {
  return {
    ...quote,
    price: roundTo(quote.price, PRICE_DECIMALS),
    marketCap: roundOptional(quote.marketCap, 2),
    volume24h: roundOptional(quote.volume24h, 2),
    change24h: roundOptional(quote.change24h, 4),
  };
}

function validateQuote(quote: AssetQuote): void {
  if (!Number.isInteger(quote.assetId) || quote.assetId <= 0) {
    throw new ValidationError(`Invalid asset id: ${quote.assetId}`);
  }
  if (!Number.isFinite(quote.price) || quote.price < 0) {
    throw new ValidationError(`Invalid price for asset ${quote.assetId}: ${quote.price}`);
  }
  if (Number.isNaN(Date.parse(quote.upstreamUpdatedAt))) {
    throw new ValidationError(`Invalid upstream timestamp for asset ${quote.assetId}`);
  }
}

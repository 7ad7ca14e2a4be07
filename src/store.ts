import type {
  AlertEvent,
  AssetQuote,
  AssetSnapshot,
  DisplayFields,
  PreferenceToggles,
  User,
  UserPreferences,
  WatchlistEntry,
} from "./types.js";

export interface AssetWrite {
  snapshot: AssetSnapshot;
  inserted: boolean;
}

/**
 * Persistence for the price cache, watchlists, alert log, preferences and users.
 *
 * Methods called on the object handed to `transaction`/`savepoint` run inside
 * that unit of work; everything else runs in its own implicit transaction.
 */
export interface Store {
  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T>;
  /** Runs `fn` so that a throw undoes only its own writes. Must be called inside a transaction. */
  savepoint<T>(name: string, fn: (tx: Store) => Promise<T>): Promise<T>;

  // ── Assets ─────────────────────────────────────────────────────────────
  /**
   * Inserts the quote, or overwrites the existing row when the quote's
   * upstream timestamp is strictly newer. Returns null when the write was
   * rejected as stale.
   */
  upsertAsset(quote: AssetQuote, writtenAt: string): Promise<AssetWrite | null>;
  getAsset(assetId: number): Promise<AssetSnapshot | null>;
  listAssets(limit: number): Promise<AssetSnapshot[]>;
  searchAssets(query: string, limit: number): Promise<AssetSnapshot[]>;
  /** Latest cache-write timestamp, across all assets or for one. */
  latestCacheWrite(assetId?: number): Promise<string | null>;

  // ── Users ──────────────────────────────────────────────────────────────
  /** Returns null when the email is already registered. */
  insertUser(user: User): Promise<User | null>;
  findUser(id: string): Promise<User | null>;
  listUsers(): Promise<User[]>;
  /** Deletes the user with every watchlist entry, alert and preference row they own. */
  deleteUser(id: string): Promise<boolean>;

  // ── Watchlist ──────────────────────────────────────────────────────────
  /** Returns false when the (user, asset) pair already exists. */
  insertWatchlistEntry(entry: WatchlistEntry): Promise<boolean>;
  getWatchlistEntry(userId: string, assetId: number): Promise<WatchlistEntry | null>;
  deleteWatchlistEntry(userId: string, assetId: number): Promise<WatchlistEntry | null>;
  listWatchlist(userId: string): Promise<WatchlistEntry[]>;
  /** Entries referencing the asset, locked for update until the transaction ends. */
  lockWatchersOf(assetId: number): Promise<WatchlistEntry[]>;
  /** Rewrites display fields on entries whose values differ; returns rows changed. */
  updateDisplayFields(assetId: number, fields: DisplayFields): Promise<number>;
  updateThreshold(userId: string, assetId: number, thresholdPercent: number): Promise<WatchlistEntry | null>;
  updateReferencePrice(entryId: string, referencePrice: number): Promise<void>;

  // ── Alert log ──────────────────────────────────────────────────────────
  insertAlertEvent(event: AlertEvent): Promise<void>;
  listAlertEvents(userId: string, limit: number, before?: string): Promise<AlertEvent[]>;

  // ── Preferences ────────────────────────────────────────────────────────
  /** Returns the user's preferences, inserting the all-enabled default if missing. */
  ensurePreferences(userId: string, now: string): Promise<UserPreferences>;
  updatePreferences(userId: string, patch: Partial<PreferenceToggles>, now: string): Promise<UserPreferences | null>;
}

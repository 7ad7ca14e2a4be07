import pg from "pg";
import { config } from "./config.js";
import type { AssetWrite, Store } from "./store.js";
import { PREFERENCE_KEYS } from "./types.js";
import type {
  AlertDirection,
  AlertEvent,
  AssetQuote,
  AssetSnapshot,
  DisplayFields,
  PreferenceToggles,
  User,
  UserPreferences,
  WatchlistEntry,
} from "./types.js";

export interface SqlClient {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

export interface SqlPoolClient extends SqlClient {
  release(err?: Error | boolean): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
}

export function createPool(databaseUrl = config.databaseUrl): pg.Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}

export function wrapPool(pool: pg.Pool): SqlPool {
  return {
    query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]) {
      return pool.query<R>(text, values);
    },
    async connect() {
      const client = await pool.connect();
      return {
        query<R extends pg.QueryResultRow = pg.QueryResultRow>(text: string, values?: unknown[]) {
          return client.query<R>(text, values);
        },
        release: (err?: Error | boolean) => client.release(err),
      };
    },
  };
}

// ── Schema initialization ────────────────────────────────────────────────

export async function initDb(db: SqlClient): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS users (
      id          TEXT PRIMARY KEY,
      email       TEXT NOT NULL,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    );
    CREATE UNIQUE INDEX IF NOT EXISTS users_email_lower_idx ON users (LOWER(email));

    CREATE TABLE IF NOT EXISTS assets (
      asset_id             INTEGER PRIMARY KEY,
      symbol               TEXT NOT NULL,
      name                 TEXT NOT NULL,
      logo_url             TEXT,
      price                NUMERIC(20,8) NOT NULL CHECK (price >= 0),
      market_cap           NUMERIC(20,2),
      volume_24h           NUMERIC(20,2),
      change_24h           NUMERIC(10,4),
      upstream_updated_at  TIMESTAMPTZ NOT NULL,
      cached_at            TIMESTAMPTZ NOT NULL,
      updated_at           TIMESTAMPTZ NOT NULL
    );
    CREATE INDEX IF NOT EXISTS assets_updated_at_idx ON assets (updated_at DESC);
    CREATE INDEX IF NOT EXISTS assets_market_cap_idx ON assets (market_cap DESC NULLS LAST);

    CREATE TABLE IF NOT EXISTS watchlist (
      id                 TEXT PRIMARY KEY,
      user_id            TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      asset_id           INTEGER NOT NULL REFERENCES assets(asset_id),
      symbol             TEXT NOT NULL,
      name               TEXT NOT NULL,
      logo_url           TEXT,
      threshold_percent  NUMERIC(7,2) NOT NULL DEFAULT 5.0 CHECK (threshold_percent > 0),
      reference_price    NUMERIC(20,8) NOT NULL,
      created_at         TIMESTAMPTZ NOT NULL DEFAULT now(),
      UNIQUE (user_id, asset_id)
    );
    CREATE INDEX IF NOT EXISTS watchlist_asset_idx ON watchlist (asset_id);

    CREATE TABLE IF NOT EXISTS alerts_log (
      id              TEXT PRIMARY KEY,
      user_id         TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      asset_id        INTEGER NOT NULL,
      symbol          TEXT NOT NULL,
      name            TEXT NOT NULL,
      logo_url        TEXT,
      trigger_price   NUMERIC(20,8) NOT NULL,
      percent_change  NUMERIC(12,4) NOT NULL,
      direction       TEXT NOT NULL CHECK (direction IN ('increase', 'decrease')),
      created_at      TIMESTAMPTZ NOT NULL DEFAULT now()
    );
    CREATE INDEX IF NOT EXISTS alerts_log_user_created_idx ON alerts_log (user_id, created_at DESC);

    CREATE TABLE IF NOT EXISTS user_preferences (
      user_id                   TEXT PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
      email_alerts_enabled      BOOLEAN NOT NULL DEFAULT true,
      daily_summary_enabled     BOOLEAN NOT NULL DEFAULT true,
      watchlist_alerts_enabled  BOOLEAN NOT NULL DEFAULT true,
      price_alerts_enabled      BOOLEAN NOT NULL DEFAULT true,
      created_at                TIMESTAMPTZ NOT NULL DEFAULT now(),
      updated_at                TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);
}

// ── Row mapping ─────────────────────────────────────────────────────────

interface AssetRow extends pg.QueryResultRow {
  assetId: number;
  symbol: string;
  name: string;
  logoUrl: string | null;
  price: string;
  marketCap: string | null;
  volume24h: string | null;
  change24h: string | null;
  upstreamUpdatedAt: Date;
  cachedAt: Date;
  updatedAt: Date;
}

interface UserRow extends pg.QueryResultRow {
  id: string;
  email: string;
  createdAt: Date;
}

interface WatchlistRow extends pg.QueryResultRow {
  id: string;
  userId: string;
  assetId: number;
  symbol: string;
  name: string;
  logoUrl: string | null;
  thresholdPercent: string;
  referencePrice: string;
  createdAt: Date;
}

interface AlertRow extends pg.QueryResultRow {
  id: string;
  userId: string;
  assetId: number;
  symbol: string;
  name: string;
  logoUrl: string | null;
  triggerPrice: string;
  percentChange: string;
  direction: AlertDirection;
  createdAt: Date;
}

interface PreferencesRow extends pg.QueryResultRow {
  userId: string;
  emailAlertsEnabled: boolean;
  dailySummaryEnabled: boolean;
  watchlistAlertsEnabled: boolean;
  priceAlertsEnabled: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const ASSET_COLUMNS = `
  asset_id AS "assetId", symbol, name, logo_url AS "logoUrl",
  price, market_cap AS "marketCap", volume_24h AS "volume24h", change_24h AS "change24h",
  upstream_updated_at AS "upstreamUpdatedAt", cached_at AS "cachedAt", updated_at AS "updatedAt"
`;

const USER_COLUMNS = `id, email, created_at AS "createdAt"`;

const WATCHLIST_COLUMNS = `
  id, user_id AS "userId", asset_id AS "assetId", symbol, name, logo_url AS "logoUrl",
  threshold_percent AS "thresholdPercent", reference_price AS "referencePrice",
  created_at AS "createdAt"
`;

const ALERT_COLUMNS = `
  id, user_id AS "userId", asset_id AS "assetId", symbol, name, logo_url AS "logoUrl",
  trigger_price AS "triggerPrice", percent_change AS "percentChange", direction,
  created_at AS "createdAt"
`;

const PREFERENCES_COLUMNS = `
  user_id AS "userId",
  email_alerts_enabled AS "emailAlertsEnabled",
  daily_summary_enabled AS "dailySummaryEnabled",
  watchlist_alerts_enabled AS "watchlistAlertsEnabled",
  price_alerts_enabled AS "priceAlertsEnabled",
  created_at AS "createdAt", updated_at AS "updatedAt"
`;

const PREFERENCE_COLUMN_NAMES: Record<keyof PreferenceToggles, string> = {
  emailAlertsEnabled: "email_alerts_enabled",
  dailySummaryEnabled: "daily_summary_enabled",
  watchlistAlertsEnabled: "watchlist_alerts_enabled",
  priceAlertsEnabled: "price_alerts_enabled",
};

function numOrNull(value: string | null): number | null {
  return value == null ? null : Number(value);
}

function rowToAsset(row: AssetRow): AssetSnapshot {
  return {
    assetId: row.assetId,
    symbol: row.symbol,
    name: row.name,
    logoUrl: row.logoUrl,
    price: Number(row.price),
    marketCap: numOrNull(row.marketCap),
    volume24h: numOrNull(row.volume24h),
    change24h: numOrNull(row.change24h),
    upstreamUpdatedAt: row.upstreamUpdatedAt.toISOString(),
    cachedAt: row.cachedAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function rowToUser(row: UserRow): User {
  return { id: row.id, email: row.email, createdAt: row.createdAt.toISOString() };
}

function rowToEntry(row: WatchlistRow): WatchlistEntry {
  return {
    id: row.id,
    userId: row.userId,
    assetId: row.assetId,
    symbol: row.symbol,
    name: row.name,
    logoUrl: row.logoUrl,
    thresholdPercent: Number(row.thresholdPercent),
    referencePrice: Number(row.referencePrice),
    createdAt: row.createdAt.toISOString(),
  };
}

function rowToAlert(row: AlertRow): AlertEvent {
  return {
    id: row.id,
    userId: row.userId,
    assetId: row.assetId,
    symbol: row.symbol,
    name: row.name,
    logoUrl: row.logoUrl,
    triggerPrice: Number(row.triggerPrice),
    percentChange: Number(row.percentChange),
    direction: row.direction,
    createdAt: row.createdAt.toISOString(),
  };
}

function rowToPreferences(row: PreferencesRow): UserPreferences {
  return {
    userId: row.userId,
    emailAlertsEnabled: row.emailAlertsEnabled,
    dailySummaryEnabled: row.dailySummaryEnabled,
    watchlistAlertsEnabled: row.watchlistAlertsEnabled,
    priceAlertsEnabled: row.priceAlertsEnabled,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function likePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

const SAVEPOINT_NAME = /^[a-z_][a-z0-9_]*$/i;

// ── Store ───────────────────────────────────────────────────────────────

export class PgStore implements Store {
  /**
   * @param db - where queries run; a checked-out client inside a transaction
   * @param pool - source of transaction clients; null once inside a transaction
   */
  constructor(
    private readonly db: SqlClient,
    private readonly pool: SqlPool | null,
  ) {}

  static fromPool(pool: SqlPool): PgStore {
    return new PgStore(pool, pool);
  }

  transaction<T>(fn: (tx: Store) => Promise<T>): Promise<T> {
    return this.inTransaction(fn);
  }

  private async inTransaction<T>(fn: (tx: PgStore) => Promise<T>): Promise<T> {
    // Nested calls join the surrounding transaction.
    if (!this.pool) return fn(this);

    const client = await this.pool.connect();
    let broken = false;
    try {
      await client.query("BEGIN");
      const result = await fn(new PgStore(client, null));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        broken = true;
        console.error("ROLLBACK failed:", (rollbackErr as Error).message);
      }
      throw err;
    } finally {
      client.release(broken);
    }
  }

  async savepoint<T>(name: string, fn: (tx: Store) => Promise<T>): Promise<T> {
    if (this.pool) throw new Error("savepoint() must be called inside a transaction");
    if (!SAVEPOINT_NAME.test(name)) throw new Error(`Invalid savepoint name: ${name}`);

    await this.db.query(`SAVEPOINT ${name}`);
    try {
      const result = await fn(this);
      await this.db.query(`RELEASE SAVEPOINT ${name}`);
      return result;
    } catch (err) {
      await this.db.query(`ROLLBACK TO SAVEPOINT ${name}`);
      throw err;
    }
  }

  // ── Assets ─────────────────────────────────────────────────────────────

  async upsertAsset(quote: AssetQuote, writtenAt: string): Promise<AssetWrite | null> {
    const { rows } = await this.db.query<AssetRow & { inserted: boolean }>(
      `INSERT INTO assets (
         asset_id, symbol, name, logo_url, price, market_cap, volume_24h, change_24h,
         upstream_updated_at, cached_at, updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $10)
       ON CONFLICT (asset_id) DO UPDATE SET
         symbol = EXCLUDED.symbol,
         name = EXCLUDED.name,
         logo_url = EXCLUDED.logo_url,
         price = EXCLUDED.price,
         market_cap = EXCLUDED.market_cap,
         volume_24h = EXCLUDED.volume_24h,
         change_24h = EXCLUDED.change_24h,
         upstream_updated_at = EXCLUDED.upstream_updated_at,
         updated_at = EXCLUDED.updated_at
       WHERE assets.upstream_updated_at < EXCLUDED.upstream_updated_at
       RETURNING ${ASSET_COLUMNS}, (xmax = 0) AS inserted`,
      [
        quote.assetId, quote.symbol, quote.name, quote.logoUrl, quote.price,
        quote.marketCap, quote.volume24h, quote.change24h, quote.upstreamUpdatedAt, writtenAt,
      ],
    );
    const row = rows[0];
    if (!row) return null;
    return { snapshot: rowToAsset(row), inserted: row.inserted };
  }

  async getAsset(assetId: number): Promise<AssetSnapshot | null> {
    const { rows } = await this.db.query<AssetRow>(
      `SELECT ${ASSET_COLUMNS} FROM assets WHERE asset_id = $1`,
      [assetId],
    );
    return rows[0] ? rowToAsset(rows[0]) : null;
  }

  async listAssets(limit: number): Promise<AssetSnapshot[]> {
    const { rows } = await this.db.query<AssetRow>(
      `SELECT ${ASSET_COLUMNS} FROM assets
       ORDER BY market_cap DESC NULLS LAST, asset_id
       LIMIT $1`,
      [limit],
    );
    return rows.map(rowToAsset);
  }

  async searchAssets(query: string, limit: number): Promise<AssetSnapshot[]> {
    const { rows } = await this.db.query<AssetRow>(
      `SELECT ${ASSET_COLUMNS} FROM assets
       WHERE symbol ILIKE $1 OR name ILIKE $1
       ORDER BY market_cap DESC NULLS LAST, asset_id
       LIMIT $2`,
      [likePattern(query), limit],
    );
    return rows.map(rowToAsset);
  }

  async latestCacheWrite(assetId?: number): Promise<string | null> {
    const { rows } = assetId == null
      ? await this.db.query<{ latest: Date | null }>(`SELECT MAX(updated_at) AS latest FROM assets`)
      : await this.db.query<{ latest: Date | null }>(
          `SELECT MAX(updated_at) AS latest FROM assets WHERE asset_id = $1`,
          [assetId],
        );
    const latest = rows[0]?.latest;
    return latest ? latest.toISOString() : null;
  }

  // ── Users ──────────────────────────────────────────────────────────────

  async insertUser(user: User): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      `INSERT INTO users (id, email, created_at)
       VALUES ($1, $2, $3)
       ON CONFLICT DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [user.id, user.email, user.createdAt],
    );
    return rows[0] ? rowToUser(rows[0]) : null;
  }

  async findUser(id: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id],
    );
    return rows[0] ? rowToUser(rows[0]) : null;
  }

  async listUsers(): Promise<User[]> {
    const { rows } = await this.db.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY created_at, id`,
    );
    return rows.map(rowToUser);
  }

  async deleteUser(id: string): Promise<boolean> {
    return this.inTransaction(async (tx) => {
      await tx.db.query(`DELETE FROM alerts_log WHERE user_id = $1`, [id]);
      await tx.db.query(`DELETE FROM watchlist WHERE user_id = $1`, [id]);
      await tx.db.query(`DELETE FROM user_preferences WHERE user_id = $1`, [id]);
      const { rowCount } = await tx.db.query(`DELETE FROM users WHERE id = $1`, [id]);
      return (rowCount ?? 0) > 0;
    });
  }

  // ── Watchlist ──────────────────────────────────────────────────────────

  async insertWatchlistEntry(entry: WatchlistEntry): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `INSERT INTO watchlist (
         id, user_id, asset_id, symbol, name, logo_url,
         threshold_percent, reference_price, created_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (user_id, asset_id) DO NOTHING`,
      [
        entry.id, entry.userId, entry.assetId, entry.symbol, entry.name, entry.logoUrl,
        entry.thresholdPercent, entry.referencePrice, entry.createdAt,
      ],
    );
    return (rowCount ?? 0) > 0;
  }

  async getWatchlistEntry(userId: string, assetId: number): Promise<WatchlistEntry | null> {
    const { rows } = await this.db.query<WatchlistRow>(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlist WHERE user_id = $1 AND asset_id = $2`,
      [userId, assetId],
    );
    return rows[0] ? rowToEntry(rows[0]) : null;
  }

  async deleteWatchlistEntry(userId: string, assetId: number): Promise<WatchlistEntry | null> {
    const { rows } = await this.db.query<WatchlistRow>(
      `DELETE FROM watchlist WHERE user_id = $1 AND asset_id = $2
       RETURNING ${WATCHLIST_COLUMNS}`,
      [userId, assetId],
    );
    return rows[0] ? rowToEntry(rows[0]) : null;
  }

  async listWatchlist(userId: string): Promise<WatchlistEntry[]> {
    const { rows } = await this.db.query<WatchlistRow>(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlist WHERE user_id = $1 ORDER BY asset_id`,
      [userId],
    );
    return rows.map(rowToEntry);
  }

  async lockWatchersOf(assetId: number): Promise<WatchlistEntry[]> {
    const { rows } = await this.db.query<WatchlistRow>(
      `SELECT ${WATCHLIST_COLUMNS} FROM watchlist WHERE asset_id = $1 ORDER BY id FOR UPDATE`,
      [assetId],
    );
    return rows.map(rowToEntry);
  }

  async updateDisplayFields(assetId: number, fields: DisplayFields): Promise<number> {
    const { rowCount } = await this.db.query(
      `UPDATE watchlist SET symbol = $2::text, name = $3::text, logo_url = $4::text
       WHERE asset_id = $1
         AND (symbol IS DISTINCT FROM $2::text
           OR name IS DISTINCT FROM $3::text
           OR logo_url IS DISTINCT FROM $4::text)`,
      [assetId, fields.symbol, fields.name, fields.logoUrl],
    );
    return rowCount ?? 0;
  }

  async updateThreshold(userId: string, assetId: number, thresholdPercent: number): Promise<WatchlistEntry | null> {
    const { rows } = await this.db.query<WatchlistRow>(
      `UPDATE watchlist SET threshold_percent = $3
       WHERE user_id = $1 AND asset_id = $2
       RETURNING ${WATCHLIST_COLUMNS}`,
      [userId, assetId, thresholdPercent],
    );
    return rows[0] ? rowToEntry(rows[0]) : null;
  }

  async updateReferencePrice(entryId: string, referencePrice: number): Promise<void> {
    await this.db.query(
      `UPDATE watchlist SET reference_price = $2 WHERE id = $1`,
      [entryId, referencePrice],
    );
  }

  // ── Alert log ──────────────────────────────────────────────────────────

  async insertAlertEvent(event: AlertEvent): Promise<void> {
    await this.db.query(
      `INSERT INTO alerts_log (
         id, user_id, asset_id, symbol, name, logo_url,
         trigger_price, percent_change, direction, created_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        event.id, event.userId, event.assetId, event.symbol, event.name, event.logoUrl,
        event.triggerPrice, event.percentChange, event.direction, event.createdAt,
      ],
    );
  }

  async listAlertEvents(userId: string, limit: number, before?: string): Promise<AlertEvent[]> {
    const { rows } = await this.db.query<AlertRow>(
      `SELECT ${ALERT_COLUMNS} FROM alerts_log
       WHERE user_id = $1 AND ($3::timestamptz IS NULL OR created_at < $3::timestamptz)
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [userId, limit, before ?? null],
    );
    return rows.map(rowToAlert);
  }

  // ── Preferences ────────────────────────────────────────────────────────

  async ensurePreferences(userId: string, now: string): Promise<UserPreferences> {
    await this.db.query(
      `INSERT INTO user_preferences (user_id, created_at, updated_at)
       VALUES ($1, $2, $2)
       ON CONFLICT (user_id) DO NOTHING`,
      [userId, now],
    );
    const { rows } = await this.db.query<PreferencesRow>(
      `SELECT ${PREFERENCES_COLUMNS} FROM user_preferences WHERE user_id = $1`,
      [userId],
    );
    if (!rows[0]) throw new Error(`Preferences for user ${userId} could not be created`);
    return rowToPreferences(rows[0]);
  }

  async updatePreferences(
    userId: string,
    patch: Partial<PreferenceToggles>,
    now: string,
  ): Promise<UserPreferences | null> {
    const sets = ["updated_at = $2"];
    const values: unknown[] = [userId, now];
    for (const key of PREFERENCE_KEYS) {
      const value = patch[key];
      if (value === undefined) continue;
      values.push(value);
      sets.push(`${PREFERENCE_COLUMN_NAMES[key]} = $${values.length}`);
    }

    const { rows } = await this.db.query<PreferencesRow>(
      `UPDATE user_preferences SET ${sets.join(", ")}
       WHERE user_id = $1
       RETURNING ${PREFERENCES_COLUMNS}`,
      values,
    );
    return rows[0] ? rowToPreferences(rows[0]) : null;
  }
}

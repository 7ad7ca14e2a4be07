import { config, isEmailConfigured } from "./config.js";
import { createPool, initDb, PgStore, wrapPool } from "./db.js";
import type { Store } from "./store.js";
import { AccountService } from "./services/account-service.js";
import { AlertEvaluator } from "./services/alert-evaluator.js";
import { AlertLog } from "./services/alert-log.js";
import { smtpMailer } from "./services/email-sender.js";
import type { Mailer } from "./services/email-sender.js";
import { Ingestor } from "./services/ingestor.js";
import type { IngestorOptions } from "./services/ingestor.js";
import { CoinDeskClient } from "./services/market-data.js";
import type { MarketDataSource } from "./services/market-data.js";
import { NotificationDispatcher } from "./services/notifier.js";
import { PreferencesStore } from "./services/preferences.js";
import { PriceCache } from "./services/price-cache.js";
import { WatchlistStore } from "./services/watchlist-store.js";

export interface Services {
  store: Store;
  cache: PriceCache;
  watchlist: WatchlistStore;
  alertLog: AlertLog;
  evaluator: AlertEvaluator;
  preferences: PreferencesStore;
  notifier: NotificationDispatcher;
  accounts: AccountService;
  ingestor: Ingestor;
}

export interface ServiceOptions {
  source: MarketDataSource;
  mailer: Mailer | null;
  appUrl?: string;
  staleMs?: number;
  now?: () => number;
  ingest?: IngestorOptions;
}

export function createServices(store: Store, options: ServiceOptions): Services {
  const now = options.now ?? Date.now;
  const cache = new PriceCache(store, { staleMs: options.staleMs, now });
  const watchlist = new WatchlistStore(store, now);
  const alertLog = new AlertLog(store);
  const evaluator = new AlertEvaluator(alertLog, now);
  const preferences = new PreferencesStore(store, now);
  const notifier = new NotificationDispatcher(store, preferences, options.mailer, options.appUrl ?? config.appUrl);
  const accounts = new AccountService({ store, watchlist, alertLog, preferences, notifier, now });
  const ingestor = new Ingestor(cache, options.source, notifier, { now, ...options.ingest });

  // Display fields are synced before alerts are evaluated.
  cache.subscribe(watchlist);
  cache.subscribe(evaluator);

  return { store, cache, watchlist, alertLog, evaluator, preferences, notifier, accounts, ingestor };
}

/** Connects to PostgreSQL, creates the schema and wires services from `config`. */
export async function openServices(): Promise<{ services: Services; close: () => Promise<void> }> {
  const pool = createPool(config.databaseUrl);
  const db = wrapPool(pool);
  await initDb(db);

  const services = createServices(PgStore.fromPool(db), {
    source: new CoinDeskClient({ baseUrl: config.coindesk.baseUrl, apiKey: config.coindesk.apiKey }),
    mailer: isEmailConfigured() ? smtpMailer : null,
    staleMs: config.cacheStaleMinutes * 60 * 1000,
    ingest: {
      limit: config.coindesk.topListLimit,
      deadlineMs: config.ingest.cycleDeadlineSeconds * 1000,
      maxRetries: config.ingest.maxRetries,
      backoffMs: config.ingest.backoffMs,
      requestTimeoutMs: config.ingest.requestTimeoutMs,
    },
  });

  return { services, close: () => pool.end() };
}

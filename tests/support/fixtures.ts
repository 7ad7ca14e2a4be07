import { createServices } from "../../src/container.js";
import type { Services } from "../../src/container.js";
import type { MailMessage, Mailer } from "../../src/services/email-sender.js";
import type { IngestorOptions } from "../../src/services/ingestor.js";
import type { MarketDataSource } from "../../src/services/market-data.js";
import type { AssetQuote } from "../../src/types.js";
import { MemoryStore } from "./memory-store.js";

export const BASE_TIME = Date.parse("2026-01-01T00:00:00.000Z");

/** ISO timestamp `seconds` after BASE_TIME. */
export function at(seconds: number): string {
  return new Date(BASE_TIME + seconds * 1000).toISOString();
}

export class TestClock {
  constructor(public ms = BASE_TIME) {}

  readonly now = (): number => this.ms;

  advance(ms: number): void {
    this.ms += ms;
  }
}

export function makeQuote(overrides: Partial<AssetQuote> = {}): AssetQuote {
  return {
    assetId: 1,
    symbol: "BTC",
    name: "Bitcoin",
    logoUrl: null,
    price: 100,
    marketCap: 1_000_000,
    volume24h: 50_000,
    change24h: 1.5,
    upstreamUpdatedAt: at(0),
    ...overrides,
  };
}

/** An upstream top-list record as the market data API returns it. */
export function rawRecord(id: number, price: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    ID: id,
    SYMBOL: `c${id}`,
    NAME: `Coin ${id}`,
    LOGO_URL: `https://img.example.com/${id}.png`,
    PRICE_USD: price,
    CIRCULATING_MKT_CAP_USD: 1_000_000 - id,
    SPOT_MOVING_24_HOUR_QUOTE_VOLUME_USD: 10_000,
    SPOT_MOVING_24_HOUR_CHANGE_PERCENTAGE_USD: 0.5,
    PRICE_USD_LAST_UPDATE_TS: BASE_TIME / 1000 + 60,
    ...overrides,
  };
}

export class RecordingMailer implements Mailer {
  readonly sent: MailMessage[] = [];
  failFor: string | null = null;

  async send(message: MailMessage): Promise<void> {
    if (message.to === this.failFor) throw new Error("SMTP connection refused");
    this.sent.push(message);
  }
}

export class StaticSource implements MarketDataSource {
  calls = 0;

  constructor(public records: unknown[] = []) {}

  async fetchTopAssets(): Promise<unknown[]> {
    this.calls++;
    return this.records;
  }
}

export interface TestEnv {
  store: MemoryStore;
  clock: TestClock;
  services: Services;
}

export function createTestEnv(
  options: { source?: MarketDataSource; mailer?: Mailer | null; ingest?: IngestorOptions } = {},
): TestEnv {
  const store = new MemoryStore();
  const clock = new TestClock();
  const services = createServices(store, {
    source: options.source ?? new StaticSource(),
    mailer: options.mailer ?? null,
    appUrl: "http://localhost:3000",
    now: clock.now,
    ingest: { sleep: async (ms) => clock.advance(ms), ...options.ingest },
  });
  return { store, clock, services };
}

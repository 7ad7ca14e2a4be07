import { z } from "zod";
import { UpstreamError } from "../errors.js";
import type { AssetQuote } from "../types.js";

export interface MarketDataSource {
  /** Raw top-list records, ranked by market cap. */
  fetchTopAssets(limit: number, signal: AbortSignal): Promise<unknown[]>;
}

const topListResponseSchema = z.object({
  Data: z.object({
    LIST: z.array(z.unknown()),
  }),
});

const assetRecordSchema = z.object({
  ID: z.number().int().positive(),
  SYMBOL: z.string().trim().min(1),
  NAME: z.string().trim().min(1),
  LOGO_URL: z.string().nullish(),
  PRICE_USD: z.number().finite().nonnegative(),
  CIRCULATING_MKT_CAP_USD: z.number().finite().nullish(),
  SPOT_MOVING_24_HOUR_QUOTE_VOLUME_USD: z.number().finite().nullish(),
  SPOT_MOVING_24_HOUR_CHANGE_PERCENTAGE_USD: z.number().finite().nullish(),
  PRICE_USD_LAST_UPDATE_TS: z.number().int().positive().nullish(),
});

/**
 * Maps one upstream record to a quote, or null when it is malformed.
 * Records without an upstream update time are stamped with `fetchedAt`.
 */
export function parseAssetRecord(raw: unknown, fetchedAt: Date): AssetQuote | null {
  const parsed = assetRecordSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;

  return {
    assetId: r.ID,
    symbol: r.SYMBOL.toUpperCase(),
    name: r.NAME,
    logoUrl: r.LOGO_URL || null,
    price: r.PRICE_USD,
    marketCap: r.CIRCULATING_MKT_CAP_USD ?? null,
    volume24h: r.SPOT_MOVING_24_HOUR_QUOTE_VOLUME_USD ?? null,
    change24h: r.SPOT_MOVING_24_HOUR_CHANGE_PERCENTAGE_USD ?? null,
    upstreamUpdatedAt: r.PRICE_USD_LAST_UPDATE_TS
      ? new Date(r.PRICE_USD_LAST_UPDATE_TS * 1000).toISOString()
      : fetchedAt.toISOString(),
  };
}

export function describeRecord(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "SYMBOL" in raw && typeof raw.SYMBOL === "string") {
    return raw.SYMBOL;
  }
  return "unknown";
}

export interface CoinDeskOptions {
  baseUrl: string;
  apiKey?: string;
  fetch?: typeof fetch;
}

export class CoinDeskClient implements MarketDataSource {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: CoinDeskOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async fetchTopAssets(limit: number, signal: AbortSignal): Promise<unknown[]> {
    const params = new URLSearchParams({
      page: "1",
      page_size: String(Math.min(Math.max(limit, 1), 100)),
      sort_by: "CIRCULATING_MKT_CAP_USD",
      sort_direction: "DESC",
      groups: "ID,BASIC,PRICE,MKT_CAP,VOLUME,CHANGE",
      toplist_quote_asset: "USD",
    });
    if (this.options.apiKey) params.set("api_key", this.options.apiKey);

    const url = `${this.options.baseUrl.replace(/\/$/, "")}/asset/v1/top/list?${params}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { "Content-Type": "application/json; charset=UTF-8" },
        signal,
      });
    } catch (err) {
      throw new UpstreamError(`Market data request failed: ${(err as Error).message}`, true);
    }

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new UpstreamError(`Market data request returned ${response.status}`, retryable, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new UpstreamError(`Market data response is not JSON: ${(err as Error).message}`, false);
    }

    const parsed = topListResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError("Market data response has no Data.LIST", false);
    }
    return parsed.data.Data.LIST;
  }
}

/** Market data for one asset as reported upstream. */
export interface AssetQuote {
  assetId: number;
  symbol: string;
  name: string;
  logoUrl: string | null;
  price: number;
  marketCap: number | null;
  volume24h: number | null;
  change24h: number | null;
  upstreamUpdatedAt: string;
}

export interface AssetSnapshot extends AssetQuote {
  /** When the asset was first cached. */
  cachedAt: string;
  /** When the cache row was last written. */
  updatedAt: string;
}

export interface DisplayFields {
  symbol: string;
  name: string;
  logoUrl: string | null;
}

export interface WatchlistEntry extends DisplayFields {
  id: string;
  userId: string;
  assetId: number;
  thresholdPercent: number;
  /** Price that future percent change is measured against; moves only when an alert fires. */
  referencePrice: number;
  createdAt: string;
}

export type AlertDirection = "increase" | "decrease";

export interface AlertEvent extends DisplayFields {
  id: string;
  userId: string;
  assetId: number;
  triggerPrice: number;
  percentChange: number;
  direction: AlertDirection;
  createdAt: string;
}

export interface UserPreferences {
  userId: string;
  emailAlertsEnabled: boolean;
  dailySummaryEnabled: boolean;
  watchlistAlertsEnabled: boolean;
  priceAlertsEnabled: boolean;
  createdAt: string;
  updatedAt: string;
}

export const PREFERENCE_KEYS = [
  "emailAlertsEnabled",
  "dailySummaryEnabled",
  "watchlistAlertsEnabled",
  "priceAlertsEnabled",
] as const;

export type PreferenceToggles = Pick<UserPreferences, (typeof PREFERENCE_KEYS)[number]>;

export interface User {
  id: string;
  email: string;
  createdAt: string;
}

import type { AlertEvent, AssetSnapshot, WatchlistEntry } from "../types.js";

export interface EmailContent {
  subject: string;
  text: string;
}

export type WatchlistChange = "added" | "removed";

export function formatPrice(price: number): string {
  if (price >= 1) return `$${price.toFixed(2)}`;
  // Four significant digits below $1.
  return `$${price.toPrecision(4)}`;
}

export function formatPercent(pct: number): string {
  return `${pct > 0 ? "+" : ""}${pct.toFixed(2)}%`;
}

export function priceAlertEmail(event: AlertEvent, appUrl: string): EmailContent {
  const verb = event.direction === "increase" ? "up" : "down";
  return {
    subject: `Price Alert: ${event.symbol} is ${verb} ${formatPercent(event.percentChange)}`,
    text: [
      `${event.symbol} (${event.name})`,
      `Current price: ${formatPrice(event.triggerPrice)}`,
      `Change since your last alert: ${formatPercent(event.percentChange)}`,
      ``,
      `This alert was triggered because the price moved past your configured threshold.`,
      `Manage your watchlist: ${appUrl}`,
    ].join("\n"),
  };
}

export function watchlistChangeEmail(entry: WatchlistEntry, change: WatchlistChange, appUrl: string): EmailContent {
  const text =
    change === "added"
      ? [
          `${entry.symbol} (${entry.name}) was added to your watchlist.`,
          `You will be alerted when it moves ${entry.thresholdPercent}% from ${formatPrice(entry.referencePrice)}.`,
        ]
      : [`${entry.symbol} (${entry.name}) was removed from your watchlist.`];

  return {
    subject: `Watchlist: ${entry.symbol} ${change}`,
    text: [...text, ``, `Manage your watchlist: ${appUrl}`].join("\n"),
  };
}

export interface SummaryLine {
  entry: WatchlistEntry;
  snapshot: AssetSnapshot | null;
}

export function dailySummaryEmail(lines: SummaryLine[], alerts: AlertEvent[], appUrl: string): EmailContent {
  const prices = lines.map(({ entry, snapshot }) => {
    if (!snapshot) return `  ${entry.symbol.padEnd(8)} no price available`;
    const change = snapshot.change24h != null ? ` (24h ${formatPercent(snapshot.change24h)})` : "";
    return `  ${entry.symbol.padEnd(8)} ${formatPrice(snapshot.price)}${change}`;
  });

  const history =
    alerts.length === 0
      ? ["  No alerts in the last 24 hours."]
      : alerts.map((a) => `  ${a.symbol.padEnd(8)} ${formatPercent(a.percentChange)} at ${formatPrice(a.triggerPrice)}`);

  return {
    subject: `Daily Summary: ${lines.length} watched asset${lines.length === 1 ? "" : "s"}`,
    text: ["Your watchlist", ...prices, ``, "Alerts in the last 24 hours", ...history, ``, `Manage your watchlist: ${appUrl}`].join(
      "\n",
    ),
  };
}

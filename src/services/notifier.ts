import type { Store } from "../store.js";
import type { AlertEvent, User, UserPreferences, WatchlistEntry } from "../types.js";
import type { EmailContent, WatchlistChange } from "./email-templates.js";
import { dailySummaryEmail, formatPercent, formatPrice, priceAlertEmail, watchlistChangeEmail } from "./email-templates.js";
import type { Mailer } from "./email-sender.js";
import type { PreferencesStore } from "./preferences.js";

export interface DeliveryReport {
  sent: number;
  skipped: number;
  failed: number;
}

export type Delivery = "sent" | "skipped" | "failed";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Sends user-facing email. A null mailer means email is not configured:
 * events are still logged, every delivery is skipped.
 */
export class NotificationDispatcher {
  constructor(
    private readonly store: Store,
    private readonly preferences: PreferencesStore,
    private readonly mailer: Mailer | null,
    private readonly appUrl: string,
  ) {}

  async dispatchAlerts(events: AlertEvent[]): Promise<DeliveryReport> {
    const report: DeliveryReport = { sent: 0, skipped: 0, failed: 0 };

    for (const event of events) {
      console.log(
        `[ALERT] ${event.symbol} (${formatPrice(event.triggerPrice)}) ${event.direction} ${formatPercent(event.percentChange)} for user ${event.userId}`,
      );
      const result = await this.deliver(
        event.userId,
        (p) => p.priceAlertsEnabled,
        () => priceAlertEmail(event, this.appUrl),
        `Price alert for ${event.symbol}`,
      );
      report[result]++;
    }

    return report;
  }

  watchlistChanged(entry: WatchlistEntry, change: WatchlistChange): Promise<Delivery> {
    return this.deliver(
      entry.userId,
      (p) => p.watchlistAlertsEnabled,
      () => watchlistChangeEmail(entry, change, this.appUrl),
      `Watchlist email for ${entry.symbol}`,
    );
  }

  /** Emails each opted-in user their watched prices and the alerts of the 24 hours before `now`. */
  async sendDailySummaries(now: Date = new Date()): Promise<DeliveryReport> {
    const report: DeliveryReport = { sent: 0, skipped: 0, failed: 0 };
    const since = now.getTime() - DAY_MS;

    for (const user of await this.store.listUsers()) {
      const entries = await this.store.listWatchlist(user.id);
      if (entries.length === 0) {
        report.skipped++;
        continue;
      }

      const result = await this.deliver(
        user.id,
        (p) => p.dailySummaryEnabled,
        async () => {
          const lines = await Promise.all(
            entries.map(async (entry) => ({ entry, snapshot: await this.store.getAsset(entry.assetId) })),
          );
          const recent = (await this.store.listAlertEvents(user.id, 100)).filter(
            (a) => Date.parse(a.createdAt) >= since && Date.parse(a.createdAt) <= now.getTime(),
          );
          return dailySummaryEmail(lines, recent, this.appUrl);
        },
        "Daily summary",
        user,
      );
      report[result]++;
    }

    console.log(`  Daily summaries: ${report.sent} sent, ${report.skipped} skipped, ${report.failed} failed`);
    return report;
  }

  private async deliver(
    userId: string,
    wants: (prefs: UserPreferences) => boolean,
    compose: () => EmailContent | Promise<EmailContent>,
    label: string,
    knownUser?: User,
  ): Promise<Delivery> {
    if (!this.mailer) return "skipped";

    try {
      const user = knownUser ?? (await this.store.findUser(userId));
      if (!user) return "skipped";

      const prefs = await this.preferences.get(userId);
      if (!prefs.emailAlertsEnabled || !wants(prefs)) return "skipped";

      const content = await compose();
      await this.mailer.send({ to: user.email, ...content });
      return "sent";
    } catch (err) {
      console.error(`  -> ${label} to user ${userId} failed:`, (err as Error).message);
      return "failed";
    }
  }
}

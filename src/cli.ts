import { Command } from "commander";
import { z } from "zod";
import { isEmailConfigured } from "./config.js";
import { openServices } from "./container.js";
import { AppError } from "./errors.js";
import { userPrincipal } from "./services/access.js";
import { formatPercent, formatPrice } from "./services/email-templates.js";
import { isPreferenceKey } from "./services/preferences.js";
import type { PreferenceToggles } from "./types.js";

const { services, close } = await openServices();

const program = new Command();

program
  .name("crypto-alerts")
  .description("Track crypto prices on a watchlist and get alerts when they move past a threshold")
  .option("-u, --user <userId>", "User id to operate as");

// ── Users ────────────────────────────────────────────────────────────────

program
  .command("init-db")
  .description("Create the database schema (also done on every start)")
  .action(() => {
    console.log("Database schema is up to date.");
  });

program
  .command("user-create <email>")
  .description("Create a new user account")
  .action(async (email: string) => {
    const user = await services.accounts.createUser(email);
    console.log(`User ${user.email} created (id: ${user.id}).`);
    console.log(`Use it with: npm run cli -- -u ${user.id} <command>`);
  });

program
  .command("user-delete")
  .description("Delete the user with their watchlist, alerts and preferences")
  .action(async () => {
    const userId = await resolveUser();
    await services.accounts.deleteUser(userPrincipal(userId), userId);
    console.log(`User ${userId} deleted.`);
  });

// ── Watchlist ────────────────────────────────────────────────────────────

program
  .command("add <assetId>")
  .description("Add an asset to the watchlist")
  .option("-t, --threshold <pct>", "Alert when the price moves this many percent")
  .action(async (assetId: string, opts: { threshold?: string }) => {
    const userId = await resolveUser();
    const threshold = opts.threshold != null ? parseFloat(opts.threshold) : undefined;
    const entry = await services.accounts.addToWatchlist(userPrincipal(userId), userId, parseAssetId(assetId), threshold);

    console.log(`\nWatching ${entry.symbol} (${entry.name}):`);
    console.log(`  Asset ID:  ${entry.assetId}`);
    console.log(`  Reference: ${formatPrice(entry.referencePrice)}`);
    console.log(`  Threshold: ${entry.thresholdPercent}%`);
  });

program
  .command("remove <assetId>")
  .description("Remove an asset from the watchlist")
  .action(async (assetId: string) => {
    const userId = await resolveUser();
    const entry = await services.accounts.removeFromWatchlist(userPrincipal(userId), userId, parseAssetId(assetId));
    console.log(`${entry.symbol} removed from watchlist.`);
  });

program
  .command("threshold <assetId> <pct>")
  .description("Change the alert threshold of a watched asset")
  .action(async (assetId: string, pct: string) => {
    const userId = await resolveUser();
    const entry = await services.accounts.updateThreshold(
      userPrincipal(userId),
      userId,
      parseAssetId(assetId),
      parseFloat(pct),
    );
    console.log(`${entry.symbol} threshold set to ${entry.thresholdPercent}%.`);
  });

program
  .command("list")
  .description("List the watchlist")
  .action(async () => {
    const userId = await resolveUser();
    const entries = await services.accounts.listWatchlist(userPrincipal(userId), userId);
    if (entries.length === 0) {
      console.log("Watchlist is empty. Use 'add' to watch an asset.");
      return;
    }

    console.log(`\n${"ID".padEnd(8)} ${"Symbol".padEnd(8)} ${"Name".padEnd(25)} ${"Threshold".padEnd(10)} ${"Reference".padEnd(14)} Price`);
    console.log("-".repeat(80));

    for (const e of entries) {
      const snapshot = await services.cache.get(e.assetId);
      const price = snapshot ? formatPrice(snapshot.price) : "-";
      console.log(
        `${String(e.assetId).padEnd(8)} ${e.symbol.padEnd(8)} ${e.name.slice(0, 24).padEnd(25)} ${`${e.thresholdPercent}%`.padEnd(10)} ${formatPrice(e.referencePrice).padEnd(14)} ${price}`,
      );
    }
    console.log();
  });

program
  .command("alerts")
  .description("Show alert history, newest first")
  .option("-l, --limit <n>", "Number of alerts to show", "20")
  .action(async (opts: { limit: string }) => {
    const userId = await resolveUser();
    const alerts = await services.accounts.listAlerts(userPrincipal(userId), userId, { limit: parseLimit(opts.limit) });
    if (alerts.length === 0) {
      console.log("No alerts yet.");
      return;
    }
    for (const a of alerts) {
      console.log(
        `${new Date(a.createdAt).toLocaleString()}  ${a.symbol.padEnd(8)} ${formatPercent(a.percentChange).padEnd(9)} at ${formatPrice(a.triggerPrice)}`,
      );
    }
  });

program
  .command("prefs")
  .description("Show or change notification preferences")
  .option("-s, --set <key=on|off...>", "Set preferences, e.g. --set dailySummaryEnabled=off")
  .action(async (opts: { set?: string[] }) => {
    const userId = await resolveUser();
    const principal = userPrincipal(userId);
    const patch: Partial<PreferenceToggles> = {};

    for (const pair of opts.set ?? []) {
      const [key, value] = pair.split("=");
      if (!key || !isPreferenceKey(key) || (value !== "on" && value !== "off")) {
        fail(`Invalid preference "${pair}". Expected <key>=on|off.`);
      }
      patch[key] = value === "on";
    }

    const prefs =
      Object.keys(patch).length > 0
        ? await services.accounts.updatePreferences(principal, userId, patch)
        : await services.accounts.getPreferences(principal, userId);

    console.log(`  emailAlertsEnabled:     ${onOff(prefs.emailAlertsEnabled)}`);
    console.log(`  priceAlertsEnabled:     ${onOff(prefs.priceAlertsEnabled)}`);
    console.log(`  watchlistAlertsEnabled: ${onOff(prefs.watchlistAlertsEnabled)}`);
    console.log(`  dailySummaryEnabled:    ${onOff(prefs.dailySummaryEnabled)}`);
  });

// ── Market data ──────────────────────────────────────────────────────────

program
  .command("assets")
  .description("List cached assets by market cap")
  .option("-l, --limit <n>", "Number of assets to show", "20")
  .action(async (opts: { limit: string }) => {
    const assets = await services.cache.list(parseLimit(opts.limit));
    if (assets.length === 0) {
      console.log("No assets cached yet. Run 'ingest' first.");
      return;
    }
    for (const a of assets) {
      const change = a.change24h != null ? formatPercent(a.change24h) : "-";
      console.log(`${String(a.assetId).padEnd(8)} ${a.symbol.padEnd(8)} ${a.name.slice(0, 24).padEnd(25)} ${formatPrice(a.price).padEnd(14)} ${change}`);
    }
  });

program
  .command("ingest")
  .description("Run one ingestion cycle now")
  .action(async () => {
    const report = await services.ingestor.runCycle();
    if (report.status !== "committed") fail(`Ingest cycle ${report.status}: ${report.error}`);
  });

program
  .command("status")
  .description("Show cache freshness and configured services")
  .action(async () => {
    const stale = await services.cache.isStale();
    const latest = await services.store.latestCacheWrite();
    console.log(`Cache:       ${stale ? "stale" : "fresh"}`);
    console.log(`Last update: ${latest ? new Date(latest).toLocaleString() : "never"}`);
    console.log(`Email:       ${isEmailConfigured() ? "configured" : "not configured"}`);
  });

// ── Helpers ──────────────────────────────────────────────────────────────

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function onOff(value: boolean): string {
  return value ? "on" : "off";
}

const limitSchema = z.coerce.number().int().positive();

function parseLimit(raw: string): number {
  const parsed = limitSchema.safeParse(raw);
  if (!parsed.success) fail(`"${raw}" is not a positive whole number`);
  return parsed.data;
}

function parseAssetId(raw: string): number {
  const id = Number(raw);
  if (!Number.isInteger(id) || id <= 0) fail(`"${raw}" is not an asset id`);
  return id;
}

async function resolveUser(): Promise<string> {
  const userId = program.opts<{ user?: string }>().user;
  if (!userId) fail("This command needs a user. Pass -u <userId>.");

  const user = await services.accounts.findUser(userId);
  if (!user) {
    console.error(`Error: User "${userId}" not found.`);
    console.error(`Create one first with: npm run cli -- user-create <email>`);
    process.exit(1);
  }
  return user.id;
}

try {
  await program.parseAsync();
} catch (err) {
  console.error(`Error: ${(err as Error).message}`);
  if (!(err instanceof AppError)) console.error(err);
  process.exitCode = 1;
} finally {
  await close();
}

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { ConflictError, NotFoundError, ValidationError } from "../errors.js";
import type { Store } from "../store.js";
import type { AlertEvent, PreferenceToggles, User, UserPreferences, WatchlistEntry } from "../types.js";
import { authorize, ownerPolicy } from "./access.js";
import type { AccessPolicy, Principal } from "./access.js";
import type { AlertLog, AlertPage } from "./alert-log.js";
import type { NotificationDispatcher } from "./notifier.js";
import type { PreferencesStore } from "./preferences.js";
import type { WatchlistStore } from "./watchlist-store.js";

const emailSchema = z.string().trim().toLowerCase().email();

export interface AccountServiceDeps {
  store: Store;
  watchlist: WatchlistStore;
  alertLog: AlertLog;
  preferences: PreferencesStore;
  notifier?: NotificationDispatcher | null;
  policy?: AccessPolicy;
  now?: () => number;
}

/** User-facing operations, each checked against the access policy before any store is touched. */
export class AccountService {
  private readonly policy: AccessPolicy;
  private readonly now: () => number;

  constructor(private readonly deps: AccountServiceDeps) {
    this.policy = deps.policy ?? ownerPolicy;
    this.now = deps.now ?? Date.now;
  }

  // ── Users ──────────────────────────────────────────────────────────────

  async createUser(email: string): Promise<User> {
    const parsed = emailSchema.safeParse(email);
    if (!parsed.success) throw new ValidationError("A valid email address is required");

    const user: User = { id: randomUUID(), email: parsed.data, createdAt: new Date(this.now()).toISOString() };
    return this.deps.store.transaction(async (tx) => {
      const created = await tx.insertUser(user);
      if (!created) throw new ConflictError(`${parsed.data} is already registered`);
      await this.deps.preferences.get(created.id, tx);
      return created;
    });
  }

  async findUser(id: string): Promise<User | null> {
    return this.deps.store.findUser(id);
  }

  async deleteUser(principal: Principal, userId: string): Promise<void> {
    authorize(this.policy, principal, "write", "account", userId);
    const deleted = await this.deps.store.deleteUser(userId);
    if (!deleted) throw new NotFoundError("User not found");
  }

  // ── Watchlist ──────────────────────────────────────────────────────────

  async listWatchlist(principal: Principal, userId: string): Promise<WatchlistEntry[]> {
    authorize(this.policy, principal, "read", "watchlist", userId);
    return this.deps.watchlist.listFor(userId);
  }

  async addToWatchlist(
    principal: Principal,
    userId: string,
    assetId: number,
    thresholdPercent?: number,
  ): Promise<WatchlistEntry> {
    authorize(this.policy, principal, "write", "watchlist", userId);
    const entry = await this.deps.watchlist.add(userId, assetId, thresholdPercent);
    await this.deps.notifier?.watchlistChanged(entry, "added");
    return entry;
  }

  async removeFromWatchlist(principal: Principal, userId: string, assetId: number): Promise<WatchlistEntry> {
    authorize(this.policy, principal, "write", "watchlist", userId);
    const entry = await this.deps.watchlist.remove(userId, assetId);
    if (!entry) throw new NotFoundError(`Asset ${assetId} is not on your watchlist`);
    await this.deps.notifier?.watchlistChanged(entry, "removed");
    return entry;
  }

  async updateThreshold(principal: Principal, userId: string, assetId: number, thresholdPercent: number): Promise<WatchlistEntry> {
    authorize(this.policy, principal, "write", "watchlist", userId);
    return this.deps.watchlist.updateThreshold(userId, assetId, thresholdPercent);
  }

  // ── Alerts ─────────────────────────────────────────────────────────────

  async listAlerts(principal: Principal, userId: string, page?: AlertPage): Promise<AlertEvent[]> {
    authorize(this.policy, principal, "read", "alert", userId);
    return this.deps.alertLog.listFor(userId, page);
  }

  // ── Preferences ────────────────────────────────────────────────────────

  async getPreferences(principal: Principal, userId: string): Promise<UserPreferences> {
    authorize(this.policy, principal, "read", "preferences", userId);
    return this.deps.preferences.get(userId);
  }

  async updatePreferences(principal: Principal, userId: string, patch: Partial<PreferenceToggles>): Promise<UserPreferences> {
    authorize(this.policy, principal, "write", "preferences", userId);
    return this.deps.preferences.update(userId, patch);
  }
}

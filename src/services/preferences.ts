import { NotFoundError } from "../errors.js";
import type { Store } from "../store.js";
import { PREFERENCE_KEYS } from "../types.js";
import type { PreferenceToggles, UserPreferences } from "../types.js";

export function isPreferenceKey(key: string): key is keyof PreferenceToggles {
  return PREFERENCE_KEYS.some((k) => k === key);
}

export class PreferencesStore {
  constructor(
    private readonly store: Store,
    private readonly now: () => number = Date.now,
  ) {}

  /** Creates the all-enabled default on first access. */
  get(userId: string, tx: Store = this.store): Promise<UserPreferences> {
    return tx.ensurePreferences(userId, this.timestamp());
  }

  async update(userId: string, patch: Partial<PreferenceToggles>): Promise<UserPreferences> {
    return this.store.transaction(async (tx) => {
      await tx.ensurePreferences(userId, this.timestamp());
      const updated = await tx.updatePreferences(userId, patch, this.timestamp());
      if (!updated) throw new NotFoundError("Preferences not found");
      return updated;
    });
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}

import { ValidationError } from "../errors.js";
import type { Store } from "../store.js";
import type { AlertEvent } from "../types.js";

export const DEFAULT_ALERT_PAGE = 50;
export const MAX_ALERT_PAGE = 100;

export interface AlertPage {
  limit?: number;
  /** Only events strictly older than this ISO timestamp. */
  before?: string;
}

/** Append-only history of emitted alerts. */
export class AlertLog {
  constructor(private readonly store: Store) {}

  append(tx: Store, event: AlertEvent): Promise<void> {
    return tx.insertAlertEvent(event);
  }

  /** Newest first. */
  listFor(userId: string, page: AlertPage = {}): Promise<AlertEvent[]> {
    const requested = page.limit !== undefined && Number.isFinite(page.limit) ? Math.trunc(page.limit) : DEFAULT_ALERT_PAGE;
    const limit = Math.min(Math.max(requested, 1), MAX_ALERT_PAGE);
    if (page.before != null && Number.isNaN(Date.parse(page.before))) {
      throw new ValidationError("before must be an ISO timestamp");
    }
    return this.store.listAlertEvents(userId, limit, page.before);
  }
}

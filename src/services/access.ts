import { ForbiddenError } from "../errors.js";

/** Who is making a call: an end user, or the ingestion/evaluation side of the system. */
export type Principal = { kind: "user"; userId: string } | { kind: "service" };

export type Resource = "account" | "asset" | "watchlist" | "alert" | "preferences";
export type Action = "read" | "write";

export interface AccessPolicy {
  isAllowed(principal: Principal, action: Action, resource: Resource, ownerId?: string): boolean;
}

export const SERVICE_PRINCIPAL: Principal = { kind: "service" };

export function userPrincipal(userId: string): Principal {
  return { kind: "user", userId };
}

/**
 * Assets are public to read and written only by the service. Accounts,
 * watchlists and preferences belong to their owner. Alerts are readable by their owner and
 * written only by the service.
 */
export const ownerPolicy: AccessPolicy = {
  isAllowed(principal, action, resource, ownerId) {
    if (principal.kind === "service") return true;

    switch (resource) {
      case "asset":
        return action === "read";
      case "alert":
        return action === "read" && ownerId === principal.userId;
      case "account":
      case "watchlist":
      case "preferences":
        return ownerId === principal.userId;
    }
  },
};

export function authorize(
  policy: AccessPolicy,
  principal: Principal,
  action: Action,
  resource: Resource,
  ownerId?: string,
): void {
  if (!policy.isAllowed(principal, action, resource, ownerId)) {
    throw new ForbiddenError(`Not allowed to ${action} this ${resource}`);
  }
}

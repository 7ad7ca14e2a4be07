import express from "express";
import { z, ZodError } from "zod";
import type { Services } from "./container.js";
import { AppError, UnauthorizedError } from "./errors.js";
import { userPrincipal } from "./services/access.js";
import type { Principal } from "./services/access.js";
import type { User } from "./types.js";

// ── Request schemas ─────────────────────────────────────────────────────

const assetIdParam = z.coerce.number().int().positive();

const listQuery = z.object({
  limit: z.coerce.number().int().positive().max(500).optional(),
});

const searchQuery = z.object({
  q: z.string().trim().min(1, "q query param required"),
  limit: z.coerce.number().int().positive().max(100).optional(),
});

const alertsQuery = z.object({
  limit: z.coerce.number().int().optional(),
  before: z.string().optional(),
});

const createUserBody = z.object({ email: z.string() });

const addWatchlistBody = z.object({
  assetId: z.coerce.number().int().positive(),
  thresholdPercent: z.coerce.number().optional(),
});

const thresholdBody = z.object({ thresholdPercent: z.coerce.number() });

const preferencesBody = z
  .object({
    emailAlertsEnabled: z.boolean(),
    dailySummaryEnabled: z.boolean(),
    watchlistAlertsEnabled: z.boolean(),
    priceAlertsEnabled: z.boolean(),
  })
  .partial()
  .strict();

// ── Helpers ─────────────────────────────────────────────────────────────

interface Caller {
  user: User;
  principal: Principal;
}

function handleError(res: express.Response, err: unknown, route: string): void {
  if (err instanceof AppError) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  if (err instanceof ZodError) {
    const [issue] = err.issues;
    const message = !issue
      ? "Invalid request"
      : issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message;
    res.status(400).json({ error: message });
    return;
  }
  console.error(`${route} error:`, err);
  res.status(500).json({ error: "Internal server error" });
}

export function createApp(services: Services): express.Express {
  const { accounts, cache, ingestor } = services;
  const app = express();

  app.use(express.json());

  /** Identity comes from the X-User-Id header; an authentication layer would set it. */
  async function identify(req: express.Request): Promise<Caller> {
    const id = req.get("x-user-id")?.trim();
    if (!id) throw new UnauthorizedError();
    const user = await accounts.findUser(id);
    if (!user) throw new UnauthorizedError("Unknown user");
    return { user, principal: userPrincipal(user.id) };
  }

  // ── Health ────────────────────────────────────────────────────────────

  app.get("/api/health", async (_req, res) => {
    try {
      res.json({ ok: true, cacheStale: await cache.isStale() });
    } catch (err) {
      handleError(res, err, "GET /api/health");
    }
  });

  // ── Asset routes (public) ─────────────────────────────────────────────

  app.get("/api/assets", async (req, res) => {
    try {
      const { limit } = listQuery.parse(req.query);
      try {
        await ingestor.refreshIfStale();
      } catch (refreshErr) {
        console.warn("  Refresh before listing assets failed:", (refreshErr as Error).message);
      }
      res.json(await cache.list(limit));
    } catch (err) {
      handleError(res, err, "GET /api/assets");
    }
  });

  app.get("/api/assets/search", async (req, res) => {
    try {
      const { q, limit } = searchQuery.parse(req.query);
      res.json(await cache.search(q, limit));
    } catch (err) {
      handleError(res, err, "GET /api/assets/search");
    }
  });

  app.get("/api/assets/:id", async (req, res) => {
    try {
      const id = assetIdParam.parse(req.params.id);
      const snapshot = await cache.get(id);
      if (!snapshot) {
        res.status(404).json({ error: `Asset ${id} not found` });
        return;
      }
      res.json(snapshot);
    } catch (err) {
      handleError(res, err, "GET /api/assets/:id");
    }
  });

  // ── User routes ───────────────────────────────────────────────────────

  app.post("/api/users", async (req, res) => {
    try {
      const { email } = createUserBody.parse(req.body);
      res.status(201).json(await accounts.createUser(email));
    } catch (err) {
      handleError(res, err, "POST /api/users");
    }
  });

  app.delete("/api/users/me", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      await accounts.deleteUser(principal, user.id);
      res.json({ ok: true });
    } catch (err) {
      handleError(res, err, "DELETE /api/users/me");
    }
  });

  // ── Watchlist routes (protected) ──────────────────────────────────────

  app.get("/api/watchlist", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      res.json(await accounts.listWatchlist(principal, user.id));
    } catch (err) {
      handleError(res, err, "GET /api/watchlist");
    }
  });

  app.post("/api/watchlist", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      const { assetId, thresholdPercent } = addWatchlistBody.parse(req.body);
      res.status(201).json(await accounts.addToWatchlist(principal, user.id, assetId, thresholdPercent));
    } catch (err) {
      handleError(res, err, "POST /api/watchlist");
    }
  });

  app.patch("/api/watchlist/:assetId", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      const assetId = assetIdParam.parse(req.params.assetId);
      const { thresholdPercent } = thresholdBody.parse(req.body);
      res.json(await accounts.updateThreshold(principal, user.id, assetId, thresholdPercent));
    } catch (err) {
      handleError(res, err, "PATCH /api/watchlist/:assetId");
    }
  });

  app.delete("/api/watchlist/:assetId", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      const assetId = assetIdParam.parse(req.params.assetId);
      res.json(await accounts.removeFromWatchlist(principal, user.id, assetId));
    } catch (err) {
      handleError(res, err, "DELETE /api/watchlist/:assetId");
    }
  });

  // ── Alert history (protected) ─────────────────────────────────────────

  app.get("/api/alerts", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      const page = alertsQuery.parse(req.query);
      res.json(await accounts.listAlerts(principal, user.id, page));
    } catch (err) {
      handleError(res, err, "GET /api/alerts");
    }
  });

  // ── Preferences (protected) ───────────────────────────────────────────

  app.get("/api/preferences", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      res.json(await accounts.getPreferences(principal, user.id));
    } catch (err) {
      handleError(res, err, "GET /api/preferences");
    }
  });

  app.patch("/api/preferences", async (req, res) => {
    try {
      const { user, principal } = await identify(req);
      const patch = preferencesBody.parse(req.body);
      res.json(await accounts.updatePreferences(principal, user.id, patch));
    } catch (err) {
      handleError(res, err, "PATCH /api/preferences");
    }
  });

  return app;
}

/**
 * Health Check Routes
 * Infrastructure endpoints for the hosting platform.
 */

import { Router } from "express";

/**
 * @param isReady reports whether the bot has started polling
 */
export function createHealthRouter(isReady: () => boolean): Router {
  const healthRouter = Router();

  /** Liveness: the process is up. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness: 503 until the bot is receiving updates. */
  healthRouter.get("/ready", (_req, res) => {
    const ready = isReady();
    res.status(ready ? 200 : 503).json({ ready });
  });

  return healthRouter;
}

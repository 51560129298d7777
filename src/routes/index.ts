/**
 * Route Aggregator
 * Combines the HTTP routers into a single exported router.
 */

import { Router } from "express";
import { createHealthRouter } from "./health.js";

export function createRouter(isReady: () => boolean): Router {
  const router = Router();
  router.use(createHealthRouter(isReady));
  return router;
}

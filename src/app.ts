import express, { type Express } from "express";
import helmet from "helmet";
import { createRouter } from "./routes/index.js";
import { notFoundHandler } from "./middlewares/notFound.js";

/**
 * Express application for health checks.
 * The bot itself talks to Telegram over long polling, not through this app.
 */
export function createApp(options: { isReady: () => boolean }): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());

  app.use(createRouter(options.isReady));

  app.use(notFoundHandler);

  return app;
}

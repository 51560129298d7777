/**
 * Bot Entry Point
 * Loads configuration, starts the health server and long polling.
 * Stops polling and closes the server on SIGINT/SIGTERM.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { initializeApp } from "./config/init.js";
import { createBotController } from "./controllers/botController.js";
import { registerBotRoutes } from "./routes/bot.js";

/** Tracks whether the bot is receiving updates. */
let isReady = false;

async function main(): Promise<void> {
  const config = loadConfig();
  const services = await initializeApp(config);

  registerBotRoutes(services.bot, createBotController(services));

  const server = createServer(createApp({ isReady: () => isReady }));
  server.listen(config.port, "0.0.0.0", () => {
    console.log(`🌐 Health server running on 0.0.0.0:${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    isReady = false;
    void services.bot
      .stop()
      .catch((err) => console.error("[server] Failed to stop bot cleanly:", err))
      .finally(() => server.close(() => process.exit(0)));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  console.log("🚀 Starting YouTube Audio Drive Bot...");
  await services.bot.start({
    onStart: (me) => {
      isReady = true;
      console.log(`✅ Bot @${me.username} is running! Press Ctrl+C to stop.`);
    },
  });
}

main().catch((error) => {
  console.error("✗ Startup failed:", error);
  process.exit(1);
});

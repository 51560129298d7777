/**
 * Bot Routes
 * Registers update handlers on the bot. Commands come first so /start and /help
 * never reach the link handler.
 */

import type { Bot } from "grammy";
import type { BotController } from "../controllers/botController.js";

export function registerBotRoutes(bot: Bot, controller: BotController): void {
  bot.command("start", (ctx) => controller.start(ctx));
  bot.command("help", (ctx) => controller.help(ctx));
  bot.on("message:text", (ctx) => controller.text(ctx));
  bot.on("message:document", (ctx) => controller.document(ctx));
}

/**
 * Telegram Bot
 * One grammy Bot per process, authenticated with the long-lived bot token.
 */

import { Bot, GrammyError, HttpError } from "grammy";

export function createBot(token: string): Bot {
  const bot = new Bot(token);

  // Handlers report their own failures; anything reaching here escaped them.
  bot.catch((err) => {
    const updateId = err.ctx.update.update_id;
    const cause = err.error;
    if (cause instanceof GrammyError) {
      console.error(`[telegram] Update ${updateId}: Bot API error ${cause.error_code} ${cause.description}`);
    } else if (cause instanceof HttpError) {
      console.error(`[telegram] Update ${updateId}: could not reach Telegram:`, cause.error);
    } else {
      console.error(`[telegram] Update ${updateId}: unhandled error:`, cause);
    }
  });

  return bot;
}

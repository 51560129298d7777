/**
 * Status Reporter
 * Keeps one editable status message per request in the originating chat.
 * Status updates are best effort: a failed edit is logged, never thrown.
 */

import type { ChatResponder } from "../external/telegram.js";

export interface StatusReporter {
  /** Posts the first status message as a reply to the request. */
  start(text: string): Promise<void>;
  /** Edits the status message, or posts a new one if start() never succeeded. */
  update(text: string): Promise<void>;
}

export function createStatusReporter(chat: ChatResponder, chatId: number, replyTo: number): StatusReporter {
  let statusMessageId: number | null = null;

  async function post(text: string): Promise<void> {
    try {
      statusMessageId = await chat.sendText(chatId, text, { replyTo });
    } catch (error) {
      console.warn(`[status] Failed to post status in chat ${chatId}:`, error);
    }
  }

  return {
    start: post,

    async update(text) {
      if (statusMessageId === null) {
        await post(text);
        return;
      }
      try {
        await chat.editText(chatId, statusMessageId, text);
      } catch (error) {
        console.warn(`[status] Failed to edit status ${statusMessageId} in chat ${chatId}:`, error);
      }
    },
  };
}

/**
 * Bot Controller
 * Maps grammy updates onto the orchestrators.
 */

import type { Context, Filter } from "grammy";
import type { Document, Message } from "grammy/types";
import {
  processLinkMessage,
  type IncomingMessage,
  type ProcessLinkDeps,
} from "../jobs/orchestrators/processLinkOrchestrator.js";
import {
  relayDocument,
  type IncomingDocument,
  type RelayDocumentDeps,
} from "../jobs/orchestrators/relayDocumentOrchestrator.js";

export const WELCOME_TEXT = [
  "🎵 Welcome to the YouTube Audio bot!",
  "",
  "📹 YouTube to audio: send a YouTube link and I'll turn it into an MP3.",
  "📚 Drive uploads: send a file (PDF, EPUB, ...) and I'll put it in Google Drive.",
  "",
  "Supported links:",
  "• youtube.com/watch?v=...",
  "• youtu.be/...",
  "• youtube.com/shorts/...",
].join("\n");

export const HELP_TEXT = [
  "How to use:",
  "",
  "🎵 YouTube conversion:",
  "1. Copy the video link from YouTube",
  "2. Paste it here and send it",
  "3. Get the audio file back",
  "",
  "📚 Uploading books:",
  "Send a PDF, EPUB or any other document and it is uploaded to Drive.",
  "",
  "Commands:",
  "/start - start the bot",
  "/help - show this help",
].join("\n");

export interface BotControllerDeps {
  link: ProcessLinkDeps;
  relay: RelayDocumentDeps;
}

export interface BotController {
  start(ctx: Context): Promise<void>;
  help(ctx: Context): Promise<void>;
  text(ctx: Filter<Context, "message:text">): Promise<void>;
  document(ctx: Filter<Context, "message:document">): Promise<void>;
}

export function toIncomingMessage(message: Message & { text: string }): IncomingMessage {
  return {
    chatId: message.chat.id,
    messageId: message.message_id,
    senderId: message.from?.id,
    text: message.text,
  };
}

export function toIncomingDocument(message: Message & { document: Document }): IncomingDocument {
  const { document } = message;
  return {
    chatId: message.chat.id,
    messageId: message.message_id,
    fileId: document.file_id,
    fileName: document.file_name,
    mimeType: document.mime_type,
    sizeBytes: document.file_size,
  };
}

export function createBotController(deps: BotControllerDeps): BotController {
  return {
    async start(ctx) {
      await ctx.reply(WELCOME_TEXT);
    },

    async help(ctx) {
      await ctx.reply(HELP_TEXT);
    },

    async text(ctx) {
      await processLinkMessage(toIncomingMessage(ctx.message), deps.link);
    },

    async document(ctx) {
      await relayDocument(toIncomingDocument(ctx.message), deps.relay);
    },
  };
}

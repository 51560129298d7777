/**
 * Telegram External Client
 * Thin wrapper around the grammy Bot API client.
 * Send failures surface as DeliveryError, file lookups as DownloadError.
 */

import { GrammyError, HttpError, InputFile, type Api } from "grammy";
import type { AudioArtifact } from "../business/audioService.js";
import { DeliveryError, DownloadError } from "../../utils/errors.js";

export interface SendOptions {
  /** Message id in the same chat to reply to */
  replyTo?: number;
}

export interface ChatResponder {
  /** Sends a text message and resolves with its message id. */
  sendText(chatId: number, text: string, options?: SendOptions): Promise<number>;
  editText(chatId: number, messageId: number, text: string): Promise<void>;
  sendAudio(chatId: number, artifact: AudioArtifact, options?: SendOptions): Promise<void>;
}

function toDeliveryError(action: string, error: unknown): DeliveryError {
  if (error instanceof GrammyError) {
    if (error.error_code === 413) {
      return new DeliveryError(
        `${action}: ${error.description}`,
        "The file is too large to send in this chat.",
        { cause: error }
      );
    }
    return new DeliveryError(`${action}: ${error.error_code} ${error.description}`, undefined, { cause: error });
  }
  if (error instanceof HttpError) {
    return new DeliveryError(`${action}: network error ${error.message}`, undefined, { cause: error });
  }
  return new DeliveryError(`${action}: ${String(error)}`, undefined, { cause: error });
}

function replyParameters(options?: SendOptions) {
  return options?.replyTo === undefined
    ? {}
    : { reply_parameters: { message_id: options.replyTo, allow_sending_without_reply: true } };
}

export function createTelegramResponder(api: Api): ChatResponder {
  return {
    async sendText(chatId, text, options) {
      try {
        const message = await api.sendMessage(chatId, text, {
          ...replyParameters(options),
          link_preview_options: { is_disabled: true },
        });
        return message.message_id;
      } catch (error) {
        throw toDeliveryError("sendMessage", error);
      }
    },

    async editText(chatId, messageId, text) {
      try {
        await api.editMessageText(chatId, messageId, text, {
          link_preview_options: { is_disabled: true },
        });
      } catch (error) {
        // Telegram rejects edits that change nothing.
        if (error instanceof GrammyError && error.description.includes("message is not modified")) {
          return;
        }
        throw toDeliveryError("editMessageText", error);
      }
    },

    async sendAudio(chatId, artifact, options) {
      console.log(`[telegram] Sending ${artifact.fileName} (${(artifact.sizeBytes / 1024 / 1024).toFixed(1)}MB) to ${chatId}`);
      try {
        await api.sendAudio(chatId, new InputFile(artifact.path, artifact.fileName), {
          ...replyParameters(options),
          title: artifact.title,
          caption: `🎵 ${artifact.title}`,
          duration: Math.round(artifact.durationSeconds) || undefined,
        });
      } catch (error) {
        throw toDeliveryError("sendAudio", error);
      }
    },
  };
}

/**
 * Builds the Bot API download URL for a file id.
 * Files above 20MB cannot be fetched through the Bot API.
 */
export async function resolveFileUrl(api: Api, token: string, fileId: string): Promise<string> {
  try {
    const file = await api.getFile(fileId);
    if (!file.file_path) {
      throw new Error(`Telegram returned no file_path for ${fileId}`);
    }
    return `https://api.telegram.org/file/bot${token}/${file.file_path}`;
  } catch (error) {
    const detail = error instanceof GrammyError ? error.description : String(error);
    const reason = /file is too big/i.test(detail) ? "too_large" : "unknown";
    throw new DownloadError(reason, `getFile: ${detail}`, { cause: error });
  }
}

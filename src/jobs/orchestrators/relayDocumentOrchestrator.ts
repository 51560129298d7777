/**
 * Relay Document Orchestrator
 * Copies a document sent to the bot (PDF, EPUB, ...) into the Drive folder.
 */

import path from "path";
import { createStatusReporter } from "../../services/business/statusReporter.js";
import type { CloudUploader, UploadResult } from "../../services/external/drive.js";
import type { ChatResponder } from "../../services/external/telegram.js";
import { describeError, getUserErrorMessage } from "../../utils/errorMessages.js";
import { DownloadError } from "../../utils/errors.js";
import { FileNames } from "../../utils/fileNames.js";
import { withTempWorkspace } from "../../utils/tempWorkspace.js";

/** Bot API refuses getFile for anything larger. */
export const BOT_API_DOWNLOAD_LIMIT_BYTES = 20 * 1024 * 1024;

export interface IncomingDocument {
  chatId: number;
  messageId: number;
  fileId: string;
  fileName?: string;
  mimeType?: string;
  sizeBytes?: number;
}

/** Downloads a chat file by id to outputPath, resolving with bytes written. */
export type ChatFileFetcher = (fileId: string, outputPath: string) => Promise<number>;

export interface RelayDocumentDeps {
  chat: ChatResponder;
  storage: CloudUploader | null;
  fetchFile: ChatFileFetcher;
  tempRootDir: string;
  maxDownloadBytes?: number;
}

export type RelayOutcome =
  | { status: "not_configured" }
  | { status: "failed"; error: unknown }
  | { status: "uploaded"; result: UploadResult };

export const DRIVE_NOT_CONFIGURED_TEXT = "⚠️ Google Drive is not configured. Set GOOGLE_DRIVE_FOLDER_ID to enable uploads.";

export async function relayDocument(
  document: IncomingDocument,
  deps: RelayDocumentDeps
): Promise<RelayOutcome> {
  const { chat, storage } = deps;

  if (!storage) {
    await chat
      .sendText(document.chatId, DRIVE_NOT_CONFIGURED_TEXT, { replyTo: document.messageId })
      .catch((err) => console.warn(`[relay] Failed to send reply: ${describeError(err)}`));
    return { status: "not_configured" };
  }

  const fileName = FileNames.document(document.fileName, document.fileId);
  const sizeMb = ((document.sizeBytes ?? 0) / 1024 / 1024).toFixed(1);
  const maxDownloadBytes = deps.maxDownloadBytes ?? BOT_API_DOWNLOAD_LIMIT_BYTES;

  console.log(`[relay] relaying ${fileName} (${sizeMb}MB) from chat ${document.chatId}`);
  const status = createStatusReporter(chat, document.chatId, document.messageId);
  await status.start(`📥 Downloading: ${fileName}...\n📦 Size: ${sizeMb}MB`);

  try {
    const result = await withTempWorkspace(deps.tempRootDir, async (workDir) => {
      if ((document.sizeBytes ?? 0) > maxDownloadBytes) {
        throw new DownloadError("too_large", `${fileName} is ${sizeMb}MB, over the ${maxDownloadBytes} byte limit`);
      }

      const localPath = path.join(workDir, fileName);
      await deps.fetchFile(document.fileId, localPath);

      await status.update("☁️ Uploading to Google Drive...");
      return storage.upload(localPath, {
        name: fileName,
        mimeType: document.mimeType ?? "application/octet-stream",
      });
    });

    await status.update(`✅ Uploaded!\n📚 ${fileName}\n🔗 ${result.webViewLink}`);
    console.log(`[relay] ✓ ${fileName} uploaded as ${result.fileId}`);
    return { status: "uploaded", result };
  } catch (error) {
    console.error(`[relay] ✗ ${fileName} failed: ${describeError(error)}`);
    await status.update(`❌ ${getUserErrorMessage(error)}`);
    return { status: "failed", error };
  }
}

/**
 * Process Link Orchestrator
 * Runs the pipeline for one chat message:
 * validate → download → transcode → reply → upload → cleanup
 */

import type { AudioArtifact, AudioFetcher } from "../../services/business/audioService.js";
import { extractVideoReference } from "../../services/business/linkExtractor.js";
import { createStatusReporter } from "../../services/business/statusReporter.js";
import type { CloudUploader, UploadResult } from "../../services/external/drive.js";
import type { ChatResponder } from "../../services/external/telegram.js";
import { describeError, getUserErrorMessage } from "../../utils/errorMessages.js";
import { InvalidLinkError } from "../../utils/errors.js";
import { withTempWorkspace } from "../../utils/tempWorkspace.js";

export interface IncomingMessage {
  chatId: number;
  messageId: number;
  /** Absent for anonymous channel posts */
  senderId?: number;
  text: string;
}

export interface ProcessLinkDeps {
  chat: ChatResponder;
  /** Null when no Drive folder is configured */
  storage: CloudUploader | null;
  fetchAudio: AudioFetcher;
  tempRootDir: string;
  maxChatFileBytes: number;
}

export type DeliveryOutcome =
  | { status: "sent" }
  | { status: "too_large" }
  | { status: "failed"; error: unknown };

export type UploadOutcome =
  | { status: "uploaded"; result: UploadResult }
  | { status: "not_configured" }
  | { status: "failed"; error: unknown };

export type LinkOutcome =
  | { status: "rejected" }
  | { status: "failed"; error: unknown }
  | {
      status: "completed";
      fileName: string;
      sizeBytes: number;
      delivery: DeliveryOutcome;
      upload: UploadOutcome;
    };

export const STATUS_TEXT = {
  downloading: "⏳ Downloading and converting the video... please wait",
  sending: "📤 Sending the file...",
  uploading: "☁️ Uploading to Google Drive...",
} as const;

function formatMegabytes(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(1)}MB`;
}

/**
 * Final status text for a request that produced an artifact.
 */
export function summarizeOutcome(
  sizeBytes: number,
  delivery: DeliveryOutcome,
  upload: UploadOutcome
): string {
  const size = formatMegabytes(sizeBytes);

  if (delivery.status === "sent") {
    switch (upload.status) {
      case "uploaded":
        return `✅ Done!\n• The file was sent to you\n• Drive: ${upload.result.webViewLink}`;
      case "not_configured":
        return "✅ The file was sent!";
      case "failed":
        return `✅ The file was sent!\n⚠️ ${getUserErrorMessage(upload.error)}`;
    }
  }

  const deliveryProblem =
    delivery.status === "too_large"
      ? `The file is too large for this chat (${size})`
      : getUserErrorMessage(delivery.error);

  switch (upload.status) {
    case "uploaded":
      return `✅ Uploaded to Google Drive!\n📁 ${deliveryProblem}\n🔗 ${upload.result.webViewLink}`;
    case "not_configured":
      return delivery.status === "too_large"
        ? `❌ ${deliveryProblem}. Configure Google Drive to receive large files.`
        : `❌ ${deliveryProblem}`;
    case "failed":
      return `❌ ${deliveryProblem}\n❌ ${getUserErrorMessage(upload.error)}`;
  }
}

async function deliver(
  deps: ProcessLinkDeps,
  message: IncomingMessage,
  artifact: AudioArtifact
): Promise<DeliveryOutcome> {
  if (artifact.sizeBytes > deps.maxChatFileBytes) {
    console.log(
      `[orchestrator] ${artifact.fileName} is ${formatMegabytes(artifact.sizeBytes)}, over the chat limit; skipping send`
    );
    return { status: "too_large" };
  }

  try {
    await deps.chat.sendAudio(message.chatId, artifact, { replyTo: message.messageId });
    return { status: "sent" };
  } catch (error) {
    console.error(`[orchestrator] ✗ Sending ${artifact.fileName} failed: ${describeError(error)}`);
    return { status: "failed", error };
  }
}

async function uploadCopy(deps: ProcessLinkDeps, artifact: AudioArtifact): Promise<UploadOutcome> {
  if (!deps.storage) {
    return { status: "not_configured" };
  }

  try {
    const result = await deps.storage.upload(artifact.path, {
      name: artifact.fileName,
      mimeType: "audio/mpeg",
    });
    return { status: "uploaded", result };
  } catch (error) {
    console.error(`[orchestrator] ✗ Uploading ${artifact.fileName} failed: ${describeError(error)}`);
    return { status: "failed", error };
  }
}

/**
 * Handles one incoming text message end to end.
 * Never throws: every stage error is logged and reported in the chat.
 */
export async function processLinkMessage(
  message: IncomingMessage,
  deps: ProcessLinkDeps
): Promise<LinkOutcome> {
  const video = extractVideoReference(message.text);

  if (!video) {
    const rejection = new InvalidLinkError(message.text);
    console.log(`[orchestrator] rejected message ${message.messageId} in chat ${message.chatId}: no YouTube link`);
    await deps.chat
      .sendText(message.chatId, rejection.userMessage, { replyTo: message.messageId })
      .catch((err) => console.warn(`[orchestrator] Failed to send invalid-link reply: ${describeError(err)}`));
    return { status: "rejected" };
  }

  console.log(`[orchestrator] processing ${video.videoId} for chat ${message.chatId}`);
  const status = createStatusReporter(deps.chat, message.chatId, message.messageId);
  await status.start(STATUS_TEXT.downloading);

  try {
    return await withTempWorkspace(deps.tempRootDir, async (workDir) => {
      // 1. Download and transcode
      const artifact = await deps.fetchAudio(video, workDir);
      console.log(`[orchestrator] produced ${artifact.fileName} (${formatMegabytes(artifact.sizeBytes)})`);

      // 2. Reply with the file; a failure here does not stop the upload
      if (artifact.sizeBytes <= deps.maxChatFileBytes) {
        await status.update(STATUS_TEXT.sending);
      }
      const delivery = await deliver(deps, message, artifact);

      // 3. Upload a copy to Drive
      if (deps.storage) {
        await status.update(STATUS_TEXT.uploading);
      }
      const upload = await uploadCopy(deps, artifact);

      await status.update(summarizeOutcome(artifact.sizeBytes, delivery, upload));
      console.log(`[orchestrator] ✓ ${video.videoId} done (delivery=${delivery.status}, upload=${upload.status})`);

      return {
        status: "completed" as const,
        fileName: artifact.fileName,
        sizeBytes: artifact.sizeBytes,
        delivery,
        upload,
      };
    });
  } catch (error) {
    console.error(`[orchestrator] ✗ ${video.videoId} failed: ${describeError(error)}`);
    await status.update(`❌ ${getUserErrorMessage(error)}`);
    return { status: "failed", error };
  }
}

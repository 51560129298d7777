/**
 * Custom Application Errors
 * One class per pipeline stage, each carrying the text shown to the chat user.
 */

/**
 * Base application error class.
 * All pipeline errors extend this; `userMessage` is safe to send to a chat.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public userMessage: string = "Something went wrong",
    public isOperational: boolean = true,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Message text held no recognisable YouTube video link.
 */
export class InvalidLinkError extends AppError {
  constructor(text: string) {
    super(
      `No YouTube video link in message: ${text.slice(0, 80)}`,
      "That doesn't look like a YouTube video link. Send something like https://youtu.be/<id> or https://www.youtube.com/watch?v=<id>."
    );
  }
}

export type DownloadFailureReason =
  | "unavailable"
  | "private"
  | "region_locked"
  | "removed"
  | "too_long"
  | "too_large"
  | "tool_missing"
  | "unknown";

const DOWNLOAD_USER_MESSAGES: Record<DownloadFailureReason, string> = {
  unavailable: "Download failed: the video is unavailable.",
  private: "Download failed: the video is private.",
  region_locked: "Download failed: the video is not available in this region.",
  removed: "Download failed: the video has been removed.",
  too_long: "The video is too long to convert.",
  too_large: "The file is too large to download.",
  tool_missing: "Download failed: the downloader is not installed on the server.",
  unknown: "Download failed.",
};

/**
 * Fetching the source (video stream or chat file) failed.
 */
export class DownloadError extends AppError {
  constructor(
    public reason: DownloadFailureReason,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super(`Download failed (${reason}): ${detail}`, DOWNLOAD_USER_MESSAGES[reason], true, options);
  }
}

/**
 * Audio extraction or MP3 encoding failed.
 */
export class TranscodeError extends AppError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Transcode failed: ${detail}`, "Converting the audio to MP3 failed.", true, options);
  }
}

/**
 * Sending to the chat failed (transport error, file over the chat limit).
 */
export class DeliveryError extends AppError {
  constructor(detail: string, userMessage = "Sending the file to this chat failed.", options?: { cause?: unknown }) {
    super(`Delivery failed: ${detail}`, userMessage, true, options);
  }
}

/**
 * Uploading to cloud storage failed (auth, quota, network).
 */
export class UploadError extends AppError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Upload failed: ${detail}`, "Uploading to Google Drive failed.", true, options);
  }
}

/**
 * Startup configuration is missing or invalid. Fatal.
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, "The bot is misconfigured.", false);
  }
}

/**
 * Error Message Utility
 * Converts technical errors into user-friendly chat messages
 */

import { AppError } from "./errors.js";

/**
 * Returns the chat-safe text for an error.
 * AppErrors carry their own; anything else is classified by keyword.
 */
export function getUserErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage;
  }

  const errorStr = String(error).toLowerCase();

  if (errorStr.includes('unavailable') || errorStr.includes('not available') || errorStr.includes('404')) {
    return 'Video unavailable';
  }
  if (errorStr.includes('private') || errorStr.includes('403')) {
    return 'Video is private';
  }
  if (errorStr.includes('yt-dlp') || errorStr.includes('download')) {
    return 'Download failed';
  }
  if (errorStr.includes('ffmpeg') || errorStr.includes('convert')) {
    return 'Audio processing failed';
  }
  if (errorStr.includes('timeout') || errorStr.includes('timed out')) {
    return 'Processing timeout';
  }
  if (errorStr.includes('drive') || errorStr.includes('upload')) {
    return 'Upload failed';
  }

  return 'Processing failed';
}

/**
 * Short description for logs: class name plus message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * File naming utilities for artifacts shown to users (chat attachment, Drive file).
 */

const MAX_BASE_NAME_LENGTH = 100;

/**
 * Reduces a video title to letters, digits, spaces, dashes and underscores.
 * Returns an empty string when nothing usable is left.
 */
export function sanitizeTitle(title: string): string {
  return title
    .normalize("NFC")
    .replace(/[^\p{L}\p{N} _-]/gu, "")
    .replace(/\s+/g, " ")
    .trim()
    .slice(0, MAX_BASE_NAME_LENGTH)
    .trim();
}

export const FileNames = {
  /** Final MP3: <sanitized title>.mp3, or <videoId>.mp3 when the title has no usable characters */
  audio: (title: string, videoId: string) => `${sanitizeTitle(title) || videoId}.mp3`,

  /** Raw stream as yt-dlp writes it; the extension is filled in by yt-dlp */
  sourceTemplate: () => "source.%(ext)s",

  /** Relayed chat document: the original name with path separators removed */
  document: (fileName: string | undefined, fileId: string) => {
    const cleaned = fileName?.replace(/[\\/\0]/g, "_").trim() ?? "";
    return /^\.*$/.test(cleaned) ? `document-${fileId}` : cleaned;
  },
} as const;

export function isSourceFile(fileName: string): boolean {
  return fileName.startsWith("source.") && !fileName.endsWith(".part") && !fileName.endsWith(".ytdl");
}

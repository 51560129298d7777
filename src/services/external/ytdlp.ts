/**
 * YouTube Download Service
 * Fetches metadata and the best audio stream with the yt-dlp binary.
 */

import { execa } from "execa";
import { readdir } from "fs/promises";
import path from "path";
import { z } from "zod";
import { DownloadError, type DownloadFailureReason } from "../../utils/errors.js";
import { FileNames, isSourceFile } from "../../utils/fileNames.js";

/** Runs the binary with args and resolves with its stdout. */
export type CommandRunner = (binary: string, args: string[]) => Promise<string>;

export const defaultRunner: CommandRunner = async (binary, args) => {
  const { stdout } = await execa(binary, args, { maxBuffer: 32 * 1024 * 1024 });
  return stdout;
};

const metadataSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  fulltitle: z.string().optional(),
  duration: z.number().nullable().optional(),
  is_live: z.boolean().nullable().optional(),
});

export interface VideoMetadata {
  id: string;
  title: string;
  durationSeconds: number;
  isLive: boolean;
}

export interface SourceDownload {
  sourcePath: string;
}

export interface YtDlpClientOptions {
  binaryPath: string;
  cookiesPath?: string;
  run?: CommandRunner;
}

export interface YtDlpClient {
  fetchMetadata(url: string): Promise<VideoMetadata>;
  downloadAudio(url: string, workDir: string): Promise<SourceDownload>;
}

/** Ordered: the first matching pattern decides the reason. */
const STDERR_REASONS: Array<[RegExp, DownloadFailureReason]> = [
  [/private video|sign in to confirm your age|members-only/i, "private"],
  [/available in your country|geo.?restrict|blocked it in your country/i, "region_locked"],
  [/has been removed|account.*terminated|copyright/i, "removed"],
  [/video unavailable|is not available|http error 404|does not exist/i, "unavailable"],
];

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/** yt-dlp's own stderr; the runner's message also carries the command line. */
function errorStderr(error: unknown): string {
  if (error instanceof Error) {
    return "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
  }
  return String(error);
}

/**
 * Maps yt-dlp stderr to a download failure reason.
 */
export function classifyYtDlpFailure(stderr: string): DownloadFailureReason {
  for (const [pattern, reason] of STDERR_REASONS) {
    if (pattern.test(stderr)) return reason;
  }
  return "unknown";
}

function toDownloadError(error: unknown): DownloadError {
  if (error instanceof DownloadError) return error;

  const detail = error instanceof Error ? error.message : String(error);
  if (errorCode(error) === "ENOENT") {
    return new DownloadError("tool_missing", detail, { cause: error });
  }

  const stderr = errorStderr(error);
  return new DownloadError(classifyYtDlpFailure(stderr), stderr || detail, { cause: error });
}

export function createYtDlpClient(options: YtDlpClientOptions): YtDlpClient {
  const run = options.run ?? defaultRunner;
  const baseArgs = ["--no-playlist", "--no-warnings"];
  if (options.cookiesPath) {
    baseArgs.push("--cookies", options.cookiesPath);
  }

  async function fetchMetadata(url: string): Promise<VideoMetadata> {
    console.log(`[youtube-dl] Fetching metadata for ${url}`);

    let raw: string;
    try {
      raw = await run(options.binaryPath, [...baseArgs, "--dump-single-json", url]);
    } catch (error) {
      throw toDownloadError(error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new DownloadError("unknown", "yt-dlp returned malformed metadata", { cause: error });
    }

    const parsed = metadataSchema.safeParse(json);
    if (!parsed.success) {
      throw new DownloadError("unknown", `Unexpected metadata shape: ${parsed.error.message}`);
    }

    const metadata: VideoMetadata = {
      id: parsed.data.id,
      title: parsed.data.title ?? parsed.data.fulltitle ?? parsed.data.id,
      durationSeconds: parsed.data.duration ?? 0,
      isLive: parsed.data.is_live ?? false,
    };

    console.log(`[youtube-dl] Title: ${metadata.title}`);
    console.log(`[youtube-dl] Duration: ${metadata.durationSeconds}s`);
    return metadata;
  }

  async function downloadAudio(url: string, workDir: string): Promise<SourceDownload> {
    console.log(`[youtube-dl] Downloading audio from: ${url}`);

    try {
      await run(options.binaryPath, [
        ...baseArgs,
        "--format",
        "bestaudio[ext=m4a]/bestaudio/best",
        "--output",
        path.join(workDir, FileNames.sourceTemplate()),
        url,
      ]);
    } catch (error) {
      throw toDownloadError(error);
    }

    const produced = (await readdir(workDir)).filter(isSourceFile);
    if (produced.length === 0) {
      throw new DownloadError("unknown", `Download completed but no audio file found in ${workDir}`);
    }

    const sourcePath = path.join(workDir, produced[0]);
    console.log(`[youtube-dl] Download completed: ${sourcePath}`);
    return { sourcePath };
  }

  return { fetchMetadata, downloadAudio };
}

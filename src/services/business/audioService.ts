/**
 * Audio Service
 * Business service turning a video reference into a local MP3 artifact.
 */

import { unlink } from "fs/promises";
import path from "path";
import { transcodeToMp3 } from "../external/ffmpeg.js";
import type { YtDlpClient } from "../external/ytdlp.js";
import { DownloadError } from "../../utils/errors.js";
import { FileNames } from "../../utils/fileNames.js";
import type { VideoReference } from "./linkExtractor.js";

export interface AudioArtifact {
  path: string;
  fileName: string;
  title: string;
  durationSeconds: number;
  sizeBytes: number;
}

/**
 * Produces the MP3 for one request inside workDir.
 * Throws DownloadError or TranscodeError.
 */
export type AudioFetcher = (video: VideoReference, workDir: string) => Promise<AudioArtifact>;

export type Transcoder = (inputPath: string, outputPath: string, opts: { bitrateKbps: number }) => Promise<number>;

export interface AudioFetcherOptions {
  ytdlp: YtDlpClient;
  maxDurationSeconds: number;
  bitrateKbps: number;
  transcode?: Transcoder;
}

export function createAudioFetcher(options: AudioFetcherOptions): AudioFetcher {
  const transcode = options.transcode ?? transcodeToMp3;

  return async (video, workDir) => {
    const metadata = await options.ytdlp.fetchMetadata(video.url);

    if (metadata.isLive) {
      throw new DownloadError("unavailable", `${video.videoId} is a live stream`);
    }
    if (metadata.durationSeconds > options.maxDurationSeconds) {
      throw new DownloadError(
        "too_long",
        `${video.videoId} runs ${metadata.durationSeconds}s, limit is ${options.maxDurationSeconds}s`
      );
    }

    const { sourcePath } = await options.ytdlp.downloadAudio(video.url, workDir);

    let fileName = FileNames.audio(metadata.title, video.videoId);
    if (path.join(workDir, fileName) === sourcePath) {
      fileName = FileNames.audio("", video.videoId);
    }
    const outputPath = path.join(workDir, fileName);
    const sizeBytes = await transcode(sourcePath, outputPath, { bitrateKbps: options.bitrateKbps });

    // Source can be as large as the MP3; free it before the send and upload.
    await unlink(sourcePath).catch((err) =>
      console.warn(`[audio] Failed to remove source stream ${sourcePath}:`, err)
    );

    return {
      path: outputPath,
      fileName,
      title: metadata.title,
      durationSeconds: metadata.durationSeconds,
      sizeBytes,
    };
  };
}

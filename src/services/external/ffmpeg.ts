/**
 * FFmpeg Service
 * Transcodes a downloaded audio stream to MP3 with fluent-ffmpeg.
 */

import ffmpeg from "fluent-ffmpeg";
import { stat } from "fs/promises";
import path from "path";
import { TranscodeError } from "../../utils/errors.js";

type TranscodeOptions = {
  bitrateKbps?: number;          // default 192
  sampleRate?: number;           // default 44100
  channels?: number;             // default 2
};

/**
 * Points fluent-ffmpeg at a specific ffmpeg binary instead of the one on PATH.
 */
export function configureFfmpeg(ffmpegPath: string | undefined): void {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
    console.log(`[ffmpeg] Using binary: ${ffmpegPath}`);
  }
}

/**
 * Encodes inputPath to an MP3 at outputPath, overwriting it.
 * Resolves with the size of the written file in bytes.
 */
export async function transcodeToMp3(
  inputPath: string,
  outputPath: string,
  opts: TranscodeOptions = {}
): Promise<number> {
  const bitrateKbps = opts.bitrateKbps ?? 192;
  const sampleRate = opts.sampleRate ?? 44100;
  const channels = opts.channels ?? 2;

  console.log(`[ffmpeg] Transcoding to MP3: ${bitrateKbps}kbps, ${sampleRate}Hz, ${channels}ch`);

  let lastLoggedPercent = -10;

  try {
    await new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .noVideo()
        .audioCodec("libmp3lame")
        .audioBitrate(`${bitrateKbps}k`)
        .audioFrequency(sampleRate)
        .audioChannels(channels)
        .format("mp3")
        .outputOptions(["-y"])
        .on("start", (line: string) => console.log(`[ffmpeg] ${line}`))
        .on("progress", (p: { percent?: number }) => {
          if (typeof p.percent === "number") {
            const rounded = Math.floor(p.percent / 10) * 10;
            if (rounded >= lastLoggedPercent + 10) {
              lastLoggedPercent = rounded;
              console.log(`[ffmpeg] Progress: ~${rounded}%`);
            }
          }
        })
        .on("end", () => resolve())
        .on("error", (err: Error) => reject(err))
        .save(outputPath);
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new TranscodeError(detail, { cause: error });
  }

  let sizeBytes: number;
  try {
    sizeBytes = (await stat(outputPath)).size;
  } catch (error) {
    throw new TranscodeError(`ffmpeg finished but ${outputPath} is missing`, { cause: error });
  }

  if (sizeBytes === 0) {
    throw new TranscodeError(`ffmpeg produced an empty file: ${outputPath}`);
  }

  console.log(`[ffmpeg] ✓ Output: ${(sizeBytes / 1024 / 1024).toFixed(2)}MB → ${path.basename(outputPath)}`);
  return sizeBytes;
}

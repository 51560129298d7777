import { existsSync } from "fs";
import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createAudioFetcher, type Transcoder } from "../src/services/business/audioService.js";
import type { VideoReference } from "../src/services/business/linkExtractor.js";
import type { VideoMetadata, YtDlpClient } from "../src/services/external/ytdlp.js";
import { DownloadError, TranscodeError } from "../src/utils/errors.js";

const video: VideoReference = {
  videoId: "dQw4w9WgXcQ",
  url: "https://www.youtube.com/watch?v=dQw4w9WgXcQ",
  kind: "watch",
};

function fakeYtDlp(metadata: Partial<VideoMetadata> = {}, sourceExt = "m4a") {
  const client = {
    fetchMetadata: vi.fn(async (): Promise<VideoMetadata> => ({
      id: video.videoId,
      title: "Test Song",
      durationSeconds: 212,
      isLive: false,
      ...metadata,
    })),
    downloadAudio: vi.fn(async (_url: string, workDir: string) => {
      const sourcePath = path.join(workDir, `source.${sourceExt}`);
      await writeFile(sourcePath, "raw-stream");
      return { sourcePath };
    }),
  } satisfies YtDlpClient;
  return client;
}

const writeMp3: Transcoder = async (_input, output) => {
  await writeFile(output, "mp3-bytes");
  return 9;
};

describe("createAudioFetcher", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await mkdtemp(path.join(os.tmpdir(), "audio-test-"));
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it("downloads, transcodes and names the MP3 after the title", async () => {
    const ytdlp = fakeYtDlp({ title: "My Song: Live!" });
    const transcode = vi.fn(writeMp3);
    const fetchAudio = createAudioFetcher({ ytdlp, maxDurationSeconds: 3600, bitrateKbps: 160, transcode });

    const artifact = await fetchAudio(video, workDir);

    expect(artifact).toEqual({
      path: path.join(workDir, "My Song Live.mp3"),
      fileName: "My Song Live.mp3",
      title: "My Song: Live!",
      durationSeconds: 212,
      sizeBytes: 9,
    });
    expect(ytdlp.fetchMetadata).toHaveBeenCalledWith(video.url);
    expect(transcode).toHaveBeenCalledWith(path.join(workDir, "source.m4a"), artifact.path, { bitrateKbps: 160 });
    expect(await readdir(workDir)).toEqual(["My Song Live.mp3"]);
  });

  it("falls back to the video id when the title would overwrite the source", async () => {
    const ytdlp = fakeYtDlp({ title: "source" }, "mp3");
    const fetchAudio = createAudioFetcher({ ytdlp, maxDurationSeconds: 3600, bitrateKbps: 192, transcode: writeMp3 });

    const artifact = await fetchAudio(video, workDir);

    expect(artifact.fileName).toBe("dQw4w9WgXcQ.mp3");
    expect(existsSync(path.join(workDir, "source.mp3"))).toBe(false);
  });

  it("rejects videos over the duration limit before downloading", async () => {
    const ytdlp = fakeYtDlp({ durationSeconds: 4 * 3600 });
    const fetchAudio = createAudioFetcher({ ytdlp, maxDurationSeconds: 3 * 3600, bitrateKbps: 192, transcode: writeMp3 });

    const error = await fetchAudio(video, workDir).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({ reason: "too_long" });
    expect(ytdlp.downloadAudio).not.toHaveBeenCalled();
  });

  it("rejects live streams", async () => {
    const ytdlp = fakeYtDlp({ isLive: true, durationSeconds: 0 });
    const fetchAudio = createAudioFetcher({ ytdlp, maxDurationSeconds: 3600, bitrateKbps: 192, transcode: writeMp3 });

    await expect(fetchAudio(video, workDir)).rejects.toMatchObject({ reason: "unavailable" });
    expect(ytdlp.downloadAudio).not.toHaveBeenCalled();
  });

  it("propagates transcode failures", async () => {
    const ytdlp = fakeYtDlp();
    const transcode: Transcoder = async () => {
      throw new TranscodeError("ffmpeg exited with code 1");
    };
    const fetchAudio = createAudioFetcher({ ytdlp, maxDurationSeconds: 3600, bitrateKbps: 192, transcode });

    await expect(fetchAudio(video, workDir)).rejects.toBeInstanceOf(TranscodeError);
  });
});

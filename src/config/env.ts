/**
 * Environment Configuration
 * Validates environment variables into a typed config object.
 * Fails fast at startup if required variables are missing.
 */

import os from "os";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

/** Treats empty strings (common in .env files) as unset. */
const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().trim().optional()
);

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === "" ? fallback : value),
    z.coerce.number().int().positive()
  );

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: optionalString.pipe(
    z.string({ required_error: "TELEGRAM_BOT_TOKEN is required" })
  ),
  GOOGLE_DRIVE_FOLDER_ID: optionalString,
  GOOGLE_CREDENTIALS_PATH: optionalString,
  PORT: positiveInt(8000),
  YTDLP_PATH: optionalString,
  YOUTUBE_COOKIES_PATH: optionalString,
  FFMPEG_PATH: optionalString,
  AUDIO_BITRATE_KBPS: positiveInt(192),
  MAX_VIDEO_DURATION_MINUTES: positiveInt(180),
  MAX_CHAT_FILE_MB: positiveInt(50),
  TEMP_DIR: optionalString,
  STALE_TEMP_MAX_AGE_HOURS: positiveInt(2),
});

export interface DriveConfig {
  folderId: string;
  credentialsPath: string;
}

export interface AppConfig {
  port: number;
  telegram: {
    token: string;
    maxFileBytes: number;
  };
  /** Null when no folder is configured; uploads are then skipped. */
  drive: DriveConfig | null;
  youtube: {
    ytdlpPath: string;
    cookiesPath?: string;
    maxDurationSeconds: number;
  };
  audio: {
    ffmpegPath?: string;
    bitrateKbps: number;
  };
  temp: {
    rootDir: string;
    staleMaxAgeHours: number;
  };
}

/**
 * Builds the process-wide config from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const vars = parsed.data;

  return {
    port: vars.PORT,
    telegram: {
      token: vars.TELEGRAM_BOT_TOKEN,
      maxFileBytes: vars.MAX_CHAT_FILE_MB * 1024 * 1024,
    },
    drive: vars.GOOGLE_DRIVE_FOLDER_ID
      ? {
          folderId: vars.GOOGLE_DRIVE_FOLDER_ID,
          credentialsPath: path.resolve(vars.GOOGLE_CREDENTIALS_PATH ?? "credentials.json"),
        }
      : null,
    youtube: {
      ytdlpPath: vars.YTDLP_PATH ?? "yt-dlp",
      cookiesPath: vars.YOUTUBE_COOKIES_PATH,
      maxDurationSeconds: vars.MAX_VIDEO_DURATION_MINUTES * 60,
    },
    audio: {
      ffmpegPath: vars.FFMPEG_PATH,
      bitrateKbps: vars.AUDIO_BITRATE_KBPS,
    },
    temp: {
      rootDir: vars.TEMP_DIR ?? path.join(os.tmpdir(), "yt-audio-bot"),
      staleMaxAgeHours: vars.STALE_TEMP_MAX_AGE_HOURS,
    },
  };
}

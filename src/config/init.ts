/**
 * Application Initialization
 * Builds every component from the loaded config and wires them together.
 * Credential problems surface here as ConfigError, before the bot polls.
 */

import type { Bot } from "grammy";
import type { AppConfig } from "./env.js";
import { createDriveClient } from "./drive.js";
import { createBot } from "./telegram.js";
import { createAudioFetcher } from "../services/business/audioService.js";
import { downloadFromUrl } from "../services/business/downloadService.js";
import { createDriveUploader, type CloudUploader } from "../services/external/drive.js";
import { configureFfmpeg } from "../services/external/ffmpeg.js";
import { createTelegramResponder, resolveFileUrl } from "../services/external/telegram.js";
import { createYtDlpClient, defaultRunner } from "../services/external/ytdlp.js";
import type { BotControllerDeps } from "../controllers/botController.js";
import { describeError } from "../utils/errorMessages.js";
import { cleanupStaleWorkspaces } from "../utils/tempWorkspace.js";

export interface AppServices extends BotControllerDeps {
  bot: Bot;
}

/**
 * Warns when an external binary cannot be run. Requests will then fail
 * with DownloadError or TranscodeError instead of the process exiting.
 */
async function checkBinary(label: string, binary: string, versionFlag: string): Promise<void> {
  try {
    const output = await defaultRunner(binary, [versionFlag]);
    console.log(`✓ ${label} available: ${output.split("\n")[0]?.trim()}`);
  } catch (error) {
    console.warn(`⚠️  ${label} not runnable at "${binary}": ${describeError(error)}`);
  }
}

async function createStorage(config: AppConfig): Promise<CloudUploader | null> {
  if (!config.drive) {
    console.log("⚠️  GOOGLE_DRIVE_FOLDER_ID not set - Drive uploads disabled");
    return null;
  }
  const drive = await createDriveClient(config.drive.credentialsPath);
  return createDriveUploader(drive.files, config.drive.folderId);
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp(config: AppConfig): Promise<AppServices> {
  console.log("Initializing application...");

  try {
    await cleanupStaleWorkspaces(config.temp.rootDir, config.temp.staleMaxAgeHours);

    configureFfmpeg(config.audio.ffmpegPath);
    await checkBinary("yt-dlp", config.youtube.ytdlpPath, "--version");
    await checkBinary("ffmpeg", config.audio.ffmpegPath ?? "ffmpeg", "-version");

    const storage = await createStorage(config);
    const bot = createBot(config.telegram.token);
    const chat = createTelegramResponder(bot.api);

    const fetchAudio = createAudioFetcher({
      ytdlp: createYtDlpClient({
        binaryPath: config.youtube.ytdlpPath,
        cookiesPath: config.youtube.cookiesPath,
      }),
      maxDurationSeconds: config.youtube.maxDurationSeconds,
      bitrateKbps: config.audio.bitrateKbps,
    });

    console.log("✓ Application initialized successfully\n");

    return {
      bot,
      link: {
        chat,
        storage,
        fetchAudio,
        tempRootDir: config.temp.rootDir,
        maxChatFileBytes: config.telegram.maxFileBytes,
      },
      relay: {
        chat,
        storage,
        tempRootDir: config.temp.rootDir,
        fetchFile: async (fileId, outputPath) =>
          downloadFromUrl(await resolveFileUrl(bot.api, config.telegram.token, fileId), outputPath),
      },
    };
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}

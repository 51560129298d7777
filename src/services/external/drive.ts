/**
 * Storage External Client — Google Drive
 * Thin wrapper around the googleapis Drive v3 files resource.
 * No business logic; streams a local file into the configured folder.
 */

import { createReadStream } from "fs";
import { stat } from "fs/promises";
import type { drive_v3 } from "googleapis";
import { UploadError } from "../../utils/errors.js";

export interface UploadResult {
  fileId: string;
  webViewLink: string;
}

export interface UploadOptions {
  name: string;
  mimeType: string;
}

export interface CloudUploader {
  upload(filePath: string, options: UploadOptions): Promise<UploadResult>;
}

/** The part of drive.files this client calls. */
export interface DriveFilesClient {
  create(params: drive_v3.Params$Resource$Files$Create): Promise<{ data: drive_v3.Schema$File }>;
}

export function driveViewLink(fileId: string): string {
  return `https://drive.google.com/file/d/${fileId}/view`;
}

function describeDriveError(error: unknown): string {
  if (error instanceof Error) {
    const status =
      "status" in error && typeof error.status === "number" ? ` (HTTP ${error.status})` : "";
    return `${error.message}${status}`;
  }
  return String(error);
}

/**
 * Creates an uploader bound to one Drive folder.
 */
export function createDriveUploader(files: DriveFilesClient, folderId: string): CloudUploader {
  return {
    async upload(filePath, { name, mimeType }) {
      let sizeBytes: number;
      try {
        sizeBytes = (await stat(filePath)).size;
      } catch (error) {
        throw new UploadError(`Local file not readable: ${filePath}`, { cause: error });
      }

      console.log(`[drive] Uploading ${name} (${(sizeBytes / 1024 / 1024).toFixed(1)}MB) to folder ${folderId}`);

      let file: drive_v3.Schema$File;
      try {
        const response = await files.create({
          requestBody: { name, parents: [folderId] },
          media: { mimeType, body: createReadStream(filePath) },
          fields: "id, webViewLink",
          supportsAllDrives: true,
        });
        file = response.data;
      } catch (error) {
        throw new UploadError(describeDriveError(error), { cause: error });
      }

      if (!file.id) {
        throw new UploadError(`Drive returned no file id for ${name}`);
      }

      console.log(`[drive] ✓ Uploaded ${name} as ${file.id}`);
      return {
        fileId: file.id,
        webViewLink: file.webViewLink ?? driveViewLink(file.id),
      };
    },
  };
}

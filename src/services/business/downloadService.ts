/**
 * Download Service
 * Business service for downloading remote files.
 */

import { writeFile } from "fs/promises";
import { DownloadError } from "../../utils/errors.js";

/**
 * Downloads a file from a URL to outputPath.
 * Returns the number of bytes written.
 */
export async function downloadFromUrl(url: string, outputPath: string): Promise<number> {
  let response: Response;
  try {
    response = await fetch(url);
  } catch (error) {
    throw new DownloadError("unknown", `Request failed: ${String(error)}`, { cause: error });
  }

  if (!response.ok) {
    const reason = response.status === 404 ? "unavailable" : "unknown";
    throw new DownloadError(reason, `HTTP ${response.status} ${response.statusText}`);
  }

  const buffer = Buffer.from(await response.arrayBuffer());
  await writeFile(outputPath, buffer);

  return buffer.length;
}

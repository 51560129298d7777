/**
 * Google Drive Client
 * Authenticates with a service-account key file, scoped to files the bot creates.
 */

import { readFile } from "fs/promises";
import { google, type drive_v3 } from "googleapis";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";

export const DRIVE_SCOPES = ["https://www.googleapis.com/auth/drive.file"];

const serviceAccountSchema = z.object({
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  project_id: z.string().optional(),
});

export type ServiceAccountKey = z.infer<typeof serviceAccountSchema>;

/**
 * Reads and validates the service-account key file.
 * Throws ConfigError when the file is missing or lacks the key fields.
 */
export async function loadServiceAccountKey(credentialsPath: string): Promise<ServiceAccountKey> {
  let raw: string;
  try {
    raw = await readFile(credentialsPath, "utf-8");
  } catch {
    throw new ConfigError(`Google credentials file not found: ${credentialsPath}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Google credentials file is not valid JSON: ${credentialsPath}`);
  }

  const parsed = serviceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `Google credentials file is not a service-account key (needs client_email and private_key): ${credentialsPath}`
    );
  }
  return parsed.data;
}

export async function createDriveClient(credentialsPath: string): Promise<drive_v3.Drive> {
  const key = await loadServiceAccountKey(credentialsPath);

  const auth = new google.auth.GoogleAuth({
    credentials: { client_email: key.client_email, private_key: key.private_key },
    projectId: key.project_id,
    scopes: DRIVE_SCOPES,
  });

  console.log(`✓ Google Drive client ready (${key.client_email})`);
  return google.drive({ version: "v3", auth });
}

import { existsSync } from "fs";
import { mkdtemp, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DRIVE_NOT_CONFIGURED_TEXT,
  relayDocument,
  type IncomingDocument,
  type RelayDocumentDeps,
} from "../src/jobs/orchestrators/relayDocumentOrchestrator.js";
import { DownloadError, UploadError } from "../src/utils/errors.js";
import { FakeChat, FakeStorage } from "./helpers/fakes.js";

const document: IncomingDocument = {
  chatId: 55,
  messageId: 3,
  fileId: "tg-file-1",
  fileName: "Book.pdf",
  mimeType: "application/pdf",
  sizeBytes: 1024 * 1024,
};

describe("relayDocument", () => {
  let tempRootDir: string;
  let chat: FakeChat;
  let storage: FakeStorage;
  const fetchedPaths: string[] = [];

  const fetchFile = vi.fn(async (_fileId: string, outputPath: string): Promise<number> => {
    fetchedPaths.push(outputPath);
    await writeFile(outputPath, "%PDF-test");
    return 9;
  });

  beforeEach(async () => {
    tempRootDir = await mkdtemp(path.join(os.tmpdir(), "relay-test-"));
    chat = new FakeChat();
    storage = new FakeStorage();
    fetchedPaths.length = 0;
  });

  afterEach(async () => {
    await rm(tempRootDir, { recursive: true, force: true });
  });

  function deps(overrides: Partial<RelayDocumentDeps> = {}): RelayDocumentDeps {
    return { chat, storage, fetchFile, tempRootDir, ...overrides };
  }

  it("tells the user Drive is not configured and downloads nothing", async () => {
    const outcome = await relayDocument(document, deps({ storage: null }));

    expect(outcome).toEqual({ status: "not_configured" });
    expect(chat.texts.map((t) => t.text)).toEqual([DRIVE_NOT_CONFIGURED_TEXT]);
    expect(fetchFile).not.toHaveBeenCalled();
  });

  it("downloads the document, uploads it and reports the link", async () => {
    const outcome = await relayDocument(document, deps());

    expect(fetchFile).toHaveBeenCalledWith("tg-file-1", expect.stringMatching(/Book\.pdf$/));
    expect(storage.uploads).toEqual([
      {
        filePath: fetchedPaths[0],
        content: "%PDF-test",
        name: "Book.pdf",
        mimeType: "application/pdf",
      },
    ]);
    expect(outcome).toEqual({
      status: "uploaded",
      result: { fileId: "file-1", webViewLink: "https://drive.google.com/file/d/file-1/view" },
    });
    expect(chat.texts.map((t) => t.text)).toEqual(["📥 Downloading: Book.pdf...\n📦 Size: 1.0MB"]);
    expect(chat.edits.map((e) => e.text)).toEqual([
      "☁️ Uploading to Google Drive...",
      "✅ Uploaded!\n📚 Book.pdf\n🔗 https://drive.google.com/file/d/file-1/view",
    ]);
    expect(existsSync(fetchedPaths[0] ?? "")).toBe(false);
    expect(await readdir(tempRootDir)).toEqual([]);
  });

  it("falls back to a generated name and generic type when Telegram sends neither", async () => {
    await relayDocument(
      { chatId: 55, messageId: 4, fileId: "tg-file-2" },
      deps()
    );

    expect(storage.uploads[0]).toMatchObject({
      name: "document-tg-file-2",
      mimeType: "application/octet-stream",
    });
  });

  it("rejects documents over the Bot API download limit before downloading", async () => {
    const outcome = await relayDocument({ ...document, sizeBytes: 25 * 1024 * 1024 }, deps());

    expect(outcome.status).toBe("failed");
    expect(fetchFile).not.toHaveBeenCalled();
    expect(storage.uploads).toEqual([]);
    expect(chat.lastEdit()).toBe("❌ The file is too large to download.");
  });

  it("reports a failed download", async () => {
    const failingFetch = vi.fn(async (): Promise<number> => {
      throw new DownloadError("unknown", "HTTP 500 Internal Server Error");
    });

    const outcome = await relayDocument(document, deps({ fetchFile: failingFetch }));

    expect(outcome.status).toBe("failed");
    expect(storage.uploads).toEqual([]);
    expect(chat.lastEdit()).toBe("❌ Download failed.");
    expect(await readdir(tempRootDir)).toEqual([]);
  });

  it("reports a failed upload and removes the local copy", async () => {
    storage.failWith = new UploadError("storage quota exceeded");

    const outcome = await relayDocument(document, deps());

    expect(outcome.status).toBe("failed");
    expect(chat.lastEdit()).toBe("❌ Uploading to Google Drive failed.");
    expect(existsSync(fetchedPaths[0] ?? "")).toBe(false);
  });
});

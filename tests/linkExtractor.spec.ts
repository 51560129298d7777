import { describe, expect, it } from "vitest";
import {
  canonicalWatchUrl,
  extractVideoReference,
  parseYouTubeUrl,
} from "../src/services/business/linkExtractor.js";

const ID = "dQw4w9WgXcQ";
const WATCH_URL = `https://www.youtube.com/watch?v=${ID}`;

describe("extractVideoReference", () => {
  it("finds a watch link inside a sentence", () => {
    expect(extractVideoReference(`Check this out ${WATCH_URL}`)).toEqual({
      videoId: ID,
      url: WATCH_URL,
      kind: "watch",
    });
  });

  it.each([
    [`https://youtu.be/${ID}?si=share-token`, "short-link"],
    [`youtube.com/shorts/${ID}`, "shorts"],
    [`https://www.youtube.com/embed/${ID}`, "embed"],
    [`https://www.youtube.com/v/${ID}`, "embed"],
    [`https://www.youtube-nocookie.com/embed/${ID}`, "embed"],
    [`https://www.youtube.com/live/${ID}?feature=share`, "live"],
    [`https://m.youtube.com/watch?v=${ID}&list=PL0000&t=42s`, "watch"],
    [`https://music.youtube.com/watch?v=${ID}`, "watch"],
    [`HTTPS://YOUTU.BE/${ID}`, "short-link"],
  ])("accepts %s", (text, kind) => {
    expect(extractVideoReference(text)).toEqual({ videoId: ID, url: WATCH_URL, kind });
  });

  it("strips punctuation wrapped around a link", () => {
    expect(extractVideoReference(`listen (https://youtu.be/${ID}).`)?.videoId).toBe(ID);
    expect(extractVideoReference(`<https://youtu.be/${ID}>`)?.videoId).toBe(ID);
  });

  it("returns the first YouTube link when several are present", () => {
    const text = "skip https://vimeo.com/1 then https://youtu.be/AAAAAAAAAAA or https://youtu.be/BBBBBBBBBBB";
    expect(extractVideoReference(text)?.videoId).toBe("AAAAAAAAAAA");
  });

  it.each([
    "hello",
    "",
    "https://vimeo.com/123456",
    "https://www.youtube.com/channel/UC0000000000000000000000",
    "https://www.youtube.com/playlist?list=PL1234567890",
    "https://www.youtube.com/watch?v=tooshort",
    "https://www.youtube.com/watch",
    `https://notyoutube.com/watch?v=${ID}`,
    `https://youtube.com.example.org/watch?v=${ID}`,
    "https://youtu.be/",
  ])("rejects %j", (text) => {
    expect(extractVideoReference(text)).toBeNull();
  });
});

describe("parseYouTubeUrl", () => {
  it("rejects tokens that are not URLs", () => {
    expect(parseYouTubeUrl("youtu be")).toBeNull();
    expect(parseYouTubeUrl("   ")).toBeNull();
  });

  it("drops extra query parameters from the canonical URL", () => {
    expect(parseYouTubeUrl(`https://www.youtube.com/watch?list=PL1&v=${ID}&index=3`)?.url).toBe(
      canonicalWatchUrl(ID)
    );
  });
});

import { describe, it, expect } from "vitest";
import {
  assertUnderPrefix,
  clipObjectKey,
  clipPrefix,
  folderMarkerKeys,
  isUnderPrefix,
  publicUrlFor,
  streamerIconKey,
  uploadThumbnailKey,
  uploadVideoKey,
  variantThumbnailName,
} from "../keys";

describe("storage keys", () => {
  it("namespaces every event object under clips/<id>/", () => {
    expect(clipPrefix(42)).toBe("clips/42/");
    expect(clipObjectKey(42, "abc_720p.mp4")).toBe("clips/42/abc_720p.mp4");
    expect(uploadVideoKey(42)).toBe("clips/42/42.mp4");
    expect(uploadThumbnailKey(42)).toBe("clips/42/thumb.jpg");
  });

  it("builds per-variant thumbnail names from clip id and label", () => {
    expect(variantThumbnailName("abc", "720p")).toBe("abc_thumb_720p.jpg");
    expect(variantThumbnailName("abc", "best")).toBe("abc_thumb_best.jpg");
  });

  it("lists both folder-marker spellings", () => {
    expect(folderMarkerKeys(7)).toEqual(["clips/7", "clips/7/"]);
  });

  it("places streamer icons at a fixed path", () => {
    expect(streamerIconKey(3)).toBe("assets/icons/streamer_3.png");
  });

  it.each(["", ".", "..", "../escape.mp4", "nested/file.mp4", "win\\file.mp4"])(
    "rejects filename %j that could leave the prefix",
    (filename) => {
      expect(() => clipObjectKey(1, filename)).toThrow(RangeError);
    }
  );

  it.each([0, -1, 1.5, Number.NaN])("rejects event id %s", (id) => {
    expect(() => clipPrefix(id)).toThrow("eventId must be a positive integer");
  });

  it("keeps every produced key under its own prefix and not a sibling's", () => {
    const key = clipObjectKey(5, "clip_360p.mp4");
    expect(isUnderPrefix(key, 5)).toBe(true);
    expect(isUnderPrefix(clipObjectKey(50, "clip_360p.mp4"), 5)).toBe(false);
  });

  it("rejects a key under another event's prefix", () => {
    expect(() => assertUnderPrefix("clips/5/clip_360p.mp4", 5)).not.toThrow();
    expect(() => assertUnderPrefix("clips/50/clip_360p.mp4", 5)).toThrow(
      'Storage key "clips/50/clip_360p.mp4" is outside clips/5/'
    );
  });

  it("joins public URLs without doubling slashes", () => {
    expect(publicUrlFor("https://media.test", "clips/1/a.mp4")).toBe("https://media.test/clips/1/a.mp4");
    expect(publicUrlFor("https://media.test//", "clips/1/a.mp4")).toBe("https://media.test/clips/1/a.mp4");
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DownloadError } from "../errors";
import { FORMAT_SELECTOR, VariantDownloader } from "../variantDownloader";
import { createFakeToolRunner } from "../../../__tests__/helpers/fakeTools";
import { createMockLogger } from "../../../__tests__/helpers/mockLogger";

const options = { bin: "yt-dlp", timeoutMs: 900_000, ffmpegLocation: "/opt/ffmpeg/bin/ffmpeg" };
const CLIP = "https://clips.example.test/AwkwardClip123";

describe("VariantDownloader", () => {
  let scratch: string;

  beforeEach(async () => {
    scratch = await mkdtemp(join(tmpdir(), "downloader_test_"));
  });

  afterEach(async () => {
    await rm(scratch, { recursive: true, force: true });
  });

  it("downloads every height and returns the files in filename order", async () => {
    const run = createFakeToolRunner({ renditions: [{ height: 720, bytes: 4096 }, { height: 360, bytes: 1024 }] });
    const downloader = new VariantDownloader(options, run, createMockLogger());

    const files = await downloader.download(CLIP, "AwkwardClip123", scratch);

    expect(files).toEqual([
      { path: join(scratch, "AwkwardClip123_360p.mp4"), filename: "AwkwardClip123_360p.mp4", height: 360, size: 1024 },
      { path: join(scratch, "AwkwardClip123_720p.mp4"), filename: "AwkwardClip123_720p.mp4", height: 720, size: 4096 },
    ]);
  });

  it("asks for one remuxed MP4 per height with a height-bearing template", async () => {
    const run = createFakeToolRunner();
    await new VariantDownloader(options, run, createMockLogger()).download(CLIP, "AwkwardClip123", scratch);

    expect(run).toHaveBeenCalledWith(
      "yt-dlp",
      [
        "-f",
        FORMAT_SELECTOR,
        "-o",
        join(scratch, "AwkwardClip123_%(height)sp.%(ext)s"),
        "--merge-output-format",
        "mp4",
        "--remux-video",
        "mp4",
        "--no-overwrites",
        "--no-playlist",
        "--no-progress",
        "--quiet",
        "--ffmpeg-location",
        "/opt/ffmpeg/bin/ffmpeg",
        "--referer",
        "https://www.twitch.tv/",
        "--user-agent",
        "Mozilla/5.0",
        CLIP,
      ],
      { timeoutMs: 900_000 }
    );
    expect(FORMAT_SELECTOR).toBe("all[height>0]/b");
  });

  it("reports an unknown height as null", async () => {
    const run = createFakeToolRunner({ renditions: [{ height: null }] });

    const [file] = await new VariantDownloader(options, run, createMockLogger()).download(CLIP, "AwkwardClip123", scratch);

    expect(file?.filename).toBe("AwkwardClip123_NAp.mp4");
    expect(file?.height).toBeNull();
  });

  it("ignores partial, empty, foreign and directory entries", async () => {
    await writeFile(join(scratch, "AwkwardClip123_1080p.mp4.part"), "partial");
    await writeFile(join(scratch, "AwkwardClip123_1080p.mp4.ytdl"), "state");
    await writeFile(join(scratch, "AwkwardClip123_480p.mp4"), "");
    await writeFile(join(scratch, "OtherClip_720p.mp4"), "other");
    await mkdir(join(scratch, "AwkwardClip123_dir"));
    const run = createFakeToolRunner({ renditions: [{ height: 720 }] });

    const files = await new VariantDownloader(options, run, createMockLogger()).download(CLIP, "AwkwardClip123", scratch);

    expect(files.map((f) => f.filename)).toEqual(["AwkwardClip123_720p.mp4"]);
  });

  it("fails when the tool fails", async () => {
    const run = createFakeToolRunner({ downloadFails: true });

    await expect(
      new VariantDownloader(options, run, createMockLogger()).download(CLIP, "AwkwardClip123", scratch)
    ).rejects.toThrow(DownloadError);
  });

  it("fails when nothing usable was written", async () => {
    const run = createFakeToolRunner({ renditions: [{ height: 720, bytes: 0 }] });

    await expect(
      new VariantDownloader(options, run, createMockLogger()).download(CLIP, "AwkwardClip123", scratch)
    ).rejects.toThrow("Downloader produced no files");
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import sharp from "sharp";
import { ValidationError } from "../errors";
import { ICON_FILENAME, IconProcessor } from "../iconProcessor";
import { createMockLogger } from "../../../__tests__/helpers/mockLogger";

async function writeImage(dir: string, name: string, width: number, height: number): Promise<string> {
  const path = join(dir, name);
  const image = sharp({ create: { width, height, channels: 3, background: { r: 200, g: 40, b: 90 } } });
  await (name.endsWith(".jpg") ? image.jpeg() : image.png()).toFile(path);
  return path;
}

describe("IconProcessor", () => {
  let dir: string;
  let processor: IconProcessor;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "icon_test_"));
    processor = new IconProcessor(createMockLogger());
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("rejects a non-square 100x50 image", async () => {
    const input = await writeImage(dir, "wide.png", 100, 50);

    const failure = processor.processIcon(input, dir);

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toThrow("Icon must be square (got 100x50)");
  });

  it("downscales a 200x200 image to 128x128 PNG", async () => {
    const input = await writeImage(dir, "big.png", 200, 200);

    const icon = await processor.processIcon(input, dir);

    expect(icon).toEqual({ path: join(dir, ICON_FILENAME), size: 128 });
    const meta = await sharp(icon.path).metadata();
    expect([meta.format, meta.width, meta.height]).toEqual(["png", 128, 128]);
  });

  it("rejects a 20x20 image as too small", async () => {
    const input = await writeImage(dir, "tiny.png", 20, 20);

    await expect(processor.processIcon(input, dir)).rejects.toThrow(
      "Icon must be at least 32x32 pixels (got 20x20)"
    );
  });

  it("keeps a 32x32 image at its size", async () => {
    const input = await writeImage(dir, "min.png", 32, 32);

    const icon = await processor.processIcon(input, dir);

    expect(icon.size).toBe(32);
    const meta = await sharp(icon.path).metadata();
    expect([meta.width, meta.height]).toEqual([32, 32]);
  });

  it("re-encodes other formats as PNG", async () => {
    const input = await writeImage(dir, "photo.jpg", 64, 64);

    const icon = await processor.processIcon(input, dir);

    expect((await sharp(icon.path).metadata()).format).toBe("png");
  });

  it("rejects files that are not images", async () => {
    const input = join(dir, "notes.png");
    await writeFile(input, "definitely not an image");

    await expect(processor.processIcon(input, dir)).rejects.toThrow("Icon could not be read as an image");
  });
});

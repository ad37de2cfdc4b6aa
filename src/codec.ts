import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { errorMessage } from "./utils.js";
import type { CodecResult, ImageCodec } from "./types.js";

const PIXEL_LIMIT = 268402689; // 16384 x 16384

function encoderFor(pipeline: sharp.Sharp, format: string, quality: number): sharp.Sharp | null {
  switch (format) {
    case "jpeg":
      return pipeline.jpeg({ quality, mozjpeg: true });
    case "png":
      return pipeline.png({ compressionLevel: 9, adaptiveFiltering: true });
    case "webp":
      return pipeline.webp({ quality, effort: 6 });
    case "avif":
      return pipeline.avif({ quality });
    case "tiff":
      return pipeline.tiff({ quality });
    case "gif":
      return pipeline.gif();
    default:
      return null;
  }
}

/**
 * Re-encodes an image in its own format at the requested quality and
 * replaces the file. A failure to read the header counts as a decode
 * failure; everything after that is an encode failure.
 */
export class SharpCodec implements ImageCodec {
  constructor() {
    // Files are rewritten in place, so a cached decode of the old bytes would be stale.
    sharp.cache(false);
  }

  async compress(filePath: string, quality: number): Promise<CodecResult> {
    let format: string;
    let pages: number;

    try {
      const metadata = await sharp(filePath, {
        failOn: "error",
        limitInputPixels: PIXEL_LIMIT,
      }).metadata();

      if (!metadata.format) {
        return { ok: false, kind: "decode", message: "unrecognised image format" };
      }
      format = metadata.format;
      pages = metadata.pages ?? 1;
    } catch (err) {
      return { ok: false, kind: "decode", message: errorMessage(err) };
    }

    let tempOutput: string | undefined;

    try {
      const pipeline = sharp(filePath, {
        failOn: "error",
        limitInputPixels: PIXEL_LIMIT,
        sequentialRead: true,
        animated: pages > 1,
      }).keepMetadata();

      const encoder = encoderFor(pipeline, format, quality);
      if (!encoder) {
        return { ok: false, kind: "encode", message: `cannot write ${format} images` };
      }

      const data = await encoder.toBuffer();
      if (data.length === 0) {
        throw new Error("Generated file is empty");
      }

      tempOutput = path.join(
        path.dirname(filePath),
        `.squeezepix-${crypto.randomBytes(8).toString("hex")}${path.extname(filePath)}`
      );
      await fs.writeFile(tempOutput, data);
      await fs.rename(tempOutput, filePath);
      tempOutput = undefined;

      return { ok: true };
    } catch (err) {
      if (tempOutput) {
        await fs.rm(tempOutput, { force: true });
      }
      return { ok: false, kind: "encode", message: errorMessage(err) };
    }
  }
}

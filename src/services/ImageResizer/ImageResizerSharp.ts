import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import sharp from "sharp";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { mtimeOf } from "@/utils/helper";

import type {
  ImageResizer,
  ImageSize,
  ResizeError,
  ResizeOutcome,
  ResizeThreshold,
} from "./ImageResizer";

export class ImageResizerSharp implements ImageResizer {
  private readonly jpegQuality: number;
  private readonly logger: Logger;

  constructor(deps: { jpegQuality: number; logger: Logger }) {
    this.jpegQuality = deps.jpegQuality;
    this.logger = deps.logger.extend("ImageResizerSharp");
  }

  async inspect(sourcePath: string): Promise<Result<ImageSize, ResizeError>> {
    const read = await readImage(sourcePath);
    if (isErr(read)) return read;
    return ok({ width: read.value.width, height: read.value.height });
  }

  async resize(
    sourcePath: string,
    targetPath: string,
    threshold: ResizeThreshold
  ): Promise<Result<ResizeOutcome, ResizeError>> {
    const sourceMtime = await mtimeOf(sourcePath);
    const targetMtime = await mtimeOf(targetPath);
    if (
      sourceMtime !== undefined &&
      targetMtime !== undefined &&
      targetMtime >= sourceMtime
    ) {
      this.logger.debug({ emoji: "♻️" })`快取命中 ${targetPath}`;
      return ok({ status: "CACHED", outputPath: targetPath });
    }

    const read = await readImage(sourcePath);
    if (isErr(read)) return read;
    const { width, height, format, size } = read.value;

    const tooLarge = Math.max(width, height) > threshold.maxDimension;
    const tooHeavy =
      threshold.maxBytes !== undefined && size > threshold.maxBytes;
    if (!tooLarge && !tooHeavy) {
      return ok({ status: "NOT_NEEDED", width, height });
    }

    try {
      await mkdir(path.dirname(targetPath), { recursive: true });
      let pipeline = sharp(sourcePath)
        .rotate() // 依 EXIF orientation 轉正
        .resize({
          width: threshold.maxDimension,
          height: threshold.maxDimension,
          fit: "inside",
          withoutEnlargement: true,
        });
      if (format === "jpeg") {
        pipeline = pipeline.jpeg({ quality: this.jpegQuality });
      }
      const info = await pipeline.toFile(targetPath);
      this.logger.debug({
        emoji: "🪄",
      })`縮圖 ${sourcePath}：${width}x${height} → ${info.width}x${info.height}`;
      return ok({
        status: "RESIZED",
        outputPath: targetPath,
        width: info.width,
        height: info.height,
      });
    } catch (e) {
      return err({
        type: "RESIZE_FAILED",
        message: `縮圖失敗 ${sourcePath}: ${errorMessage(e)}`,
      });
    }
  }
}

async function readImage(sourcePath: string): Promise<
  Result<
    { width: number; height: number; format?: string; size: number },
    ResizeError
  >
> {
  let metadata: sharp.Metadata;
  let size: number;
  try {
    metadata = await sharp(sourcePath).metadata();
    size = (await stat(sourcePath)).size;
  } catch (e) {
    return err({
      type: "IMAGE_DECODE_FAILED",
      message: `無法讀取圖片 ${sourcePath}: ${errorMessage(e)}`,
    });
  }
  const { width, height, format } = metadata;
  if (!width || !height) {
    return err({
      type: "IMAGE_DECODE_FAILED",
      message: `無法取得圖片尺寸: ${sourcePath}`,
    });
  }
  return ok({ width, height, format, size });
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

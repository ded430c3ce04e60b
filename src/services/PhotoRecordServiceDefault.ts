import { copyFile, mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { GalleryConfig } from "@/config/GalleryConfig";
import { picturesDirName, resizedDirName } from "@/constants";
import type { PhotoExif, PhotoIssue, PhotoRecord } from "@/types";
import { mtimeOf, toSitePath } from "@/utils/helper";

import type { ExifService } from "./ExifService";
import type { FileNameParser, ParsedFileName } from "./FileNameParser";
import {
  compareSortKeys,
  duplicateSlugMessage,
} from "./GalleryModelBuilderDefault";
import { type ImageResizer, resizedFileName } from "./ImageResizer";
import type {
  PhotoRecordResult,
  PhotoRecordService,
} from "./PhotoRecordService";

/**
 * 將來源檔案轉成 PhotoRecord。
 *
 * 先解析全部檔名（失敗即排除），再依相簿順序逐檔：
 *   slug 重複檢查 → EXIF（失敗只降級）→ 縮圖或解碼檢查 → 複製原圖到輸出目錄
 * 分組日期一律以檔名為準，EXIF 拍攝時間只保留作顯示用。
 */
export class PhotoRecordServiceDefault implements PhotoRecordService {
  private readonly parser: FileNameParser;
  private readonly exifService: ExifService;
  private readonly resizer: ImageResizer;
  private readonly config: GalleryConfig;
  private readonly logger: Logger;

  constructor(deps: {
    parser: FileNameParser;
    exifService: ExifService;
    resizer: ImageResizer;
    config: GalleryConfig;
    logger: Logger;
  }) {
    this.parser = deps.parser;
    this.exifService = deps.exifService;
    this.resizer = deps.resizer;
    this.config = deps.config;
    this.logger = deps.logger.extend("PhotoRecordServiceDefault");
  }

  async collect(filePaths: string[]): Promise<PhotoRecordResult> {
    const result: PhotoRecordResult = {
      records: [],
      issues: [],
      notices: [],
      resize: { resized: 0, cached: 0, notNeeded: 0 },
    };
    const parsedFiles: ParsedFileName[] = [];
    for (const filePath of filePaths) {
      const parsed = this.parser.parse(filePath);
      if (isErr(parsed)) {
        this.skip(result.issues, {
          filePath,
          type: parsed.error.type,
          message: parsed.error.message,
        });
        continue;
      }
      parsedFiles.push(parsed.value);
    }

    // 依相簿順序處理，slug 重複的後者在輸出任何檔案前就排除
    parsedFiles.sort((a, b) =>
      compareSortKeys(
        { date: a.date, fileName: a.fileName, path: a.filePath },
        { date: b.date, fileName: b.fileName, path: b.filePath }
      )
    );
    const published = new Map<string, PhotoRecord>();
    const total = parsedFiles.length;
    let done = 0;

    for (const parsed of parsedFiles) {
      done++;
      const first = published.get(parsed.slug);
      if (first) {
        this.skip(result.issues, {
          filePath: parsed.filePath,
          type: "DUPLICATE_SLUG",
          message: duplicateSlugMessage(parsed.slug, first.fileName),
        });
        continue;
      }

      const record = await this.buildRecord(parsed, result);
      if (!record) continue;
      published.set(record.slug, record);
      result.records.push(record);
      this.logger.info({
        emoji: "📷",
        count: done,
      })`已處理 ${done}/${total}：${parsed.fileName}`;
    }

    return result;
  }

  private async buildRecord(
    parsed: ParsedFileName,
    result: PhotoRecordResult
  ): Promise<PhotoRecord | undefined> {
    const { filePath, fileName } = parsed;
    const picturesDir = path.join(this.config.outputDir, picturesDirName);

    let exif: PhotoExif | undefined;
    let camera: string | undefined;
    let gps: PhotoRecord["gps"];
    const exifResult = await this.exifService.readExif(filePath);
    if (isErr(exifResult)) {
      result.notices.push({
        filePath,
        type: "METADATA_READ_FAILED",
        reason: exifResult.error.type,
        message: exifResult.error.message,
      });
      this.logger.debug({
        emoji: "🫥",
        reason: exifResult.error.type,
      })`沒有可用的 EXIF，改用檔名資訊：${fileName}`;
    } else {
      const { filePath: _, gps: exifGps, ...fields } = exifResult.value;
      exif = fields;
      camera = fields.cameraModel;
      gps = exifGps;
      const exifDate = fields.captureTime?.toISOString().slice(0, 10);
      if (exifDate && exifDate !== parsed.date) {
        this.logger.debug({
          emoji: "📅",
          fileDate: parsed.date,
          exifDate,
        })`EXIF 日期與檔名不同，以檔名為準：${fileName}`;
      }
    }

    let resizedPath: string | undefined;
    if (parsed.suppressLightbox) {
      // 不縮圖也要確認能解碼，壞檔不進相簿
      const inspected = await this.resizer.inspect(filePath);
      if (isErr(inspected)) {
        this.skip(result.issues, {
          filePath,
          type: inspected.error.type,
          message: inspected.error.message,
        });
        return undefined;
      }
    } else {
      const resizedName = resizedFileName(
        fileName,
        this.config.resizeThreshold
      );
      const resize = await this.resizer.resize(
        filePath,
        path.join(picturesDir, resizedDirName, resizedName),
        this.config.resizeThreshold
      );
      if (isErr(resize)) {
        this.skip(result.issues, {
          filePath,
          type: resize.error.type,
          message: resize.error.message,
        });
        return undefined;
      }
      switch (resize.value.status) {
        case "NOT_NEEDED":
          result.resize.notNeeded++;
          break;
        case "RESIZED":
          result.resize.resized++;
          resizedPath = toSitePath(picturesDirName, resizedDirName, resizedName);
          break;
        case "CACHED":
          result.resize.cached++;
          resizedPath = toSitePath(picturesDirName, resizedDirName, resizedName);
          break;
      }
    }

    const published = await publishOriginal(
      filePath,
      path.join(picturesDir, fileName)
    );
    if (isErr(published)) {
      this.skip(result.issues, {
        filePath,
        type: "COPY_FAILED",
        message: published.error,
      });
      return undefined;
    }

    return Object.freeze({
      sourcePath: filePath,
      fileName,
      slug: parsed.slug,
      date: parsed.date,
      title: parsed.title,
      suppressLightbox: parsed.suppressLightbox,
      exif,
      camera,
      gps,
      imagePath: toSitePath(picturesDirName, fileName),
      resizedPath,
    });
  }

  private skip(issues: PhotoIssue[], issue: PhotoIssue) {
    issues.push(issue);
    this.logger.warn({
      emoji: "⏭️",
      type: issue.type,
    })`略過 ${path.basename(issue.filePath)}：${issue.message}`;
  }
}

/** 原圖複製到輸出目錄；目標比來源新就不重複複製 */
async function publishOriginal(
  sourcePath: string,
  targetPath: string
): Promise<Result<"COPIED" | "UP_TO_DATE", string>> {
  const sourceMtime = await mtimeOf(sourcePath);
  const targetMtime = await mtimeOf(targetPath);
  if (
    sourceMtime !== undefined &&
    targetMtime !== undefined &&
    targetMtime >= sourceMtime
  ) {
    return ok("UP_TO_DATE");
  }
  try {
    await mkdir(path.dirname(targetPath), { recursive: true });
    await copyFile(sourcePath, targetPath);
    return ok("COPIED");
  } catch (e) {
    return err(
      `複製原圖失敗 ${sourcePath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

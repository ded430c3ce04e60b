import { access, constants, mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { GalleryConfig } from "@/config/GalleryConfig";
import { feedFileName, imageExtensions } from "@/constants";

import type { FeedGenerator } from "./FeedGenerator";
import type { FileSystemScanner } from "./FileSystemScanner";
import type {
  BuildError,
  BuildSummary,
  GalleryBuildService,
} from "./GalleryBuildService";
import type { GalleryModelBuilder } from "./GalleryModelBuilder";
import type { PageRenderer } from "./PageRenderer";
import type { PhotoRecordService } from "./PhotoRecordService";

/**
 * 掃描 → 建立 PhotoRecord → GalleryModel → 頁面 → feed，依序執行一次。
 * 單一檔案的問題只排除該檔；掃描、輸出目錄與樣板錯誤則中止整次執行。
 */
export class GalleryBuildServiceDefault implements GalleryBuildService {
  private readonly scanner: FileSystemScanner;
  private readonly recordService: PhotoRecordService;
  private readonly modelBuilder: GalleryModelBuilder;
  private readonly renderer: PageRenderer;
  private readonly feedGenerator: FeedGenerator;
  private readonly config: GalleryConfig;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    recordService: PhotoRecordService;
    modelBuilder: GalleryModelBuilder;
    renderer: PageRenderer;
    feedGenerator: FeedGenerator;
    config: GalleryConfig;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.recordService = deps.recordService;
    this.modelBuilder = deps.modelBuilder;
    this.renderer = deps.renderer;
    this.feedGenerator = deps.feedGenerator;
    this.config = deps.config;
    this.logger = deps.logger.extend("GalleryBuildServiceDefault");
  }

  async build(): Promise<Result<BuildSummary, BuildError>> {
    const { sourceDir, outputDir } = this.config;

    // 1) 掃描
    const scanRes = await this.scanner.scan(sourceDir, {
      allowExts: imageExtensions,
    });
    if (isErr(scanRes)) {
      return err({
        type: "SCAN_FAILED",
        message: `掃描來源目錄失敗 ${sourceDir}: ${scanRes.error.message}`,
      });
    }
    const filePaths = scanRes.value;
    this.logger.info({
      emoji: "🔎",
      count: filePaths.length,
    })`掃描完成，共 ${filePaths.length} 個圖檔`;

    const writable = await ensureWritableDir(outputDir);
    if (isErr(writable)) return writable;

    // 2) 逐檔建立 PhotoRecord（含縮圖）
    const collected = await this.recordService.collect(filePaths);

    // 3) GalleryModel
    const { model, issues: modelIssues } = this.modelBuilder.build(
      collected.records
    );
    const issues = [...collected.issues, ...modelIssues];
    for (const issue of modelIssues) {
      this.logger.warn({ emoji: "⏭️", type: issue.type })`${issue.message}`;
    }
    this.logger.info({
      emoji: "📚",
      count: model.size,
      groups: model.groups.length,
    })`相簿建立完成`;

    // 4) 頁面：樣板錯誤影響整個網站，直接中止
    const rendered = this.renderer.render(model);
    if (isErr(rendered)) {
      return err({
        type: "TEMPLATE_RENDER_FAILED",
        message: rendered.error.message,
      });
    }
    for (const page of rendered.value) {
      const written = await this.writeOutput(page.path, page.content);
      if (isErr(written)) return written;
    }
    this.logger.info({
      emoji: "🧾",
      count: rendered.value.length,
    })`已輸出 ${rendered.value.length} 個頁面`;

    // 5) feed：失敗只警告，網站照常輸出
    const warnings: string[] = [];
    let feedWritten = false;
    const feed = this.feedGenerator.generate(
      model.mostRecent(this.config.feedItemCount)
    );
    if (isErr(feed)) {
      warnings.push(feed.error.message);
      this.logger.warn({ emoji: "📡" })`${feed.error.message}，本次不輸出 feed`;
      // 上次留下的 feed.xml 一併移除
      const removed = await this.removeOutput(feedFileName);
      if (isErr(removed)) return removed;
    } else {
      const written = await this.writeOutput(feedFileName, feed.value);
      if (isErr(written)) return written;
      feedWritten = true;
    }

    return ok({
      scanned: filePaths.length,
      photos: model.size,
      pages: rendered.value.map((p) => p.path),
      feedWritten,
      resize: collected.resize,
      issues,
      notices: collected.notices,
      warnings,
    });
  }

  private async removeOutput(
    relativePath: string
  ): Promise<Result<void, BuildError>> {
    const target = path.join(this.config.outputDir, relativePath);
    try {
      await rm(target, { force: true });
      return ok();
    } catch (e) {
      return err({
        type: "OUTPUT_NOT_WRITABLE",
        message: `無法移除 ${target}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  private async writeOutput(
    relativePath: string,
    content: string
  ): Promise<Result<void, BuildError>> {
    const target = path.join(this.config.outputDir, relativePath);
    try {
      await writeFile(target, content, "utf8");
      return ok();
    } catch (e) {
      return err({
        type: "OUTPUT_NOT_WRITABLE",
        message: `無法寫入 ${target}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }
}

async function ensureWritableDir(
  dir: string
): Promise<Result<void, BuildError>> {
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
    return ok();
  } catch (e) {
    return err({
      type: "OUTPUT_NOT_WRITABLE",
      message: `輸出目錄無法寫入 ${dir}: ${e instanceof Error ? e.message : String(e)}`,
    });
  }
}

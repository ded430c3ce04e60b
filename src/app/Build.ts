import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { type ConfigLayer, loadGalleryConfig } from "@/config/GalleryConfig";
import { ExifServiceExifTool } from "@/services/ExifService";
import { FeedGeneratorFeed } from "@/services/FeedGenerator";
import { FileNameParserDefault } from "@/services/FileNameParser";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { GalleryBuildServiceDefault } from "@/services/GalleryBuildServiceDefault";
import { GalleryModelBuilderDefault } from "@/services/GalleryModelBuilderDefault";
import { ImageResizerSharp } from "@/services/ImageResizer";
import { PageRendererNunjucks } from "@/services/PageRenderer";
import { PhotoRecordServiceDefault } from "@/services/PhotoRecordServiceDefault";
import { expandHome } from "@/utils/helper";

type BuildOptions = {
  output?: string;
  config?: string;
  maxDimension?: number | string;
  maxBytes?: number | string;
  quality?: number | string;
  marker?: string;
  feedItems?: number | string;
  feedFormat?: string;
  pageSize?: number | string;
  siteUrl?: string;
  siteTitle?: string;
  templates?: string;
  reportDir?: string;
};

export function registerBuild(cli: CAC, baseLogger: Logger) {
  cli
    .command("build [folder]", "將相片目錄產生為靜態相簿網站")
    .option("--output <path>", "輸出目錄，預設 output")
    .option("--config <file>", "JSON 設定檔")
    .option("--max-dimension <px>", "最長邊超過此值就縮圖，預設 800")
    .option("--max-bytes <bytes>", "檔案超過此大小也縮圖")
    .option("--quality <n>", "JPEG 縮圖品質，預設 85")
    .option("--marker <word>", "標題中代表不縮圖 / 不套 lightbox 的字，預設 small")
    .option("--feed-items <n>", "feed 收錄最新幾張，預設 20")
    .option("--feed-format <format>", "rss 或 atom，預設 rss")
    .option("--page-size <n>", "每頁幾張，預設 10")
    .option("--site-url <url>", "網站網址，用於 feed 的絕對連結")
    .option("--site-title <title>", "網站標題")
    .option("--templates <path>", "nunjucks 樣板目錄")
    .option("--report-dir <path>", "報告輸出目錄", { default: "reports" })
    .action(async (folder: string | undefined, options: BuildOptions) => {
      const start = Date.now();
      const logger = baseLogger.extend("build", { emoji: "🖼️" });

      const configRes = await loadGalleryConfig({
        configFile: options.config && expandHome(options.config),
        overrides: toConfigLayer(folder, options),
      });
      if (isErr(configRes)) {
        logger.error({ emoji: "❌", details: configRes.error.details })`${configRes.error.message}`;
        process.exitCode = 1;
        return;
      }
      const config = configRes.value;
      logger.info({
        event: "start",
      })`來源: ${config.sourceDir} → 輸出: ${config.outputDir}`;

      const exifService = new ExifServiceExifTool();
      const service = new GalleryBuildServiceDefault({
        scanner: new FileSystemScannerDefault(),
        recordService: new PhotoRecordServiceDefault({
          parser: new FileNameParserDefault(config),
          exifService,
          resizer: new ImageResizerSharp({
            jpegQuality: config.jpegQuality,
            logger,
          }),
          config,
          logger,
        }),
        modelBuilder: new GalleryModelBuilderDefault(),
        renderer: new PageRendererNunjucks({ config, logger }),
        feedGenerator: new FeedGeneratorFeed({ config }),
        config,
        logger,
      });

      const result = await service
        .build()
        .finally(() => dispose(exifService));

      if (isErr(result)) {
        logger.error({ emoji: "❌", type: result.error.type })`${result.error.message}`;
        process.exitCode = 1;
        return;
      }

      const summary = result.value;
      if (
        summary.issues.length > 0 ||
        summary.notices.length > 0 ||
        summary.warnings.length > 0
      ) {
        const reporter = new DumpWriterDefault(logger, options.reportDir);
        await reporter.dump("build-report", {
          skipped: summary.issues,
          degraded: summary.notices,
          warnings: summary.warnings,
        });
      }
      for (const issue of summary.issues) {
        logger.warn({ emoji: "⏭️", type: issue.type })`${issue.filePath}：${issue.message}`;
      }

      const elapsed = ((Date.now() - start) / 1000).toFixed(2);
      logger.info({
        event: "done",
        photos: summary.photos,
        skipped: summary.issues.length,
        pages: summary.pages.length,
        feed: summary.feedWritten,
        ...summary.resize,
      })`完成：${summary.photos} 張相片、略過 ${summary.issues.length} 個檔案，用時 ${elapsed}s`;
    });
}

function toConfigLayer(
  folder: string | undefined,
  options: BuildOptions
): ConfigLayer {
  return {
    sourceDir: folder && expandHome(folder),
    outputDir: options.output && expandHome(options.output),
    resizeThreshold: {
      maxDimension: options.maxDimension,
      maxBytes: options.maxBytes,
    },
    jpegQuality: options.quality,
    smallImageMarker: options.marker,
    feedItemCount: options.feedItems,
    feedFormat: options.feedFormat,
    pageSize: options.pageSize,
    templatesDir: options.templates && expandHome(options.templates),
    site: {
      baseUrl: options.siteUrl,
      title: options.siteTitle,
    },
  };
}

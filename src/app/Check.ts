import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr, isOk } from "~shared/utils/Result";

import { loadGalleryConfig } from "@/config/GalleryConfig";
import { imageExtensions } from "@/constants";
import {
  type FileNameIssue,
  FileNameParserDefault,
  type ParsedFileName,
} from "@/services/FileNameParser";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { expandHome } from "@/utils/helper";

type CheckOptions = {
  config?: string;
  marker?: string;
  reportDir?: string;
};

export function registerCheck(cli: CAC, baseLogger: Logger) {
  cli
    .command("check [folder]", "只檢查檔名格式，不產生網站")
    .option("--config <file>", "JSON 設定檔")
    .option("--marker <word>", "標題中代表不縮圖 / 不套 lightbox 的字")
    .option("--report-dir <path>", "報告輸出目錄", { default: "reports" })
    .action(async (folder: string | undefined, options: CheckOptions) => {
      const logger = baseLogger.extend("check");

      const configRes = await loadGalleryConfig({
        configFile: options.config && expandHome(options.config),
        overrides: {
          sourceDir: folder && expandHome(folder),
          smallImageMarker: options.marker,
        },
      });
      if (isErr(configRes)) {
        logger.error({ emoji: "❌", details: configRes.error.details })`${configRes.error.message}`;
        process.exitCode = 1;
        return;
      }
      const config = configRes.value;

      const scanRes = await new FileSystemScannerDefault().scan(
        config.sourceDir,
        { allowExts: imageExtensions }
      );
      if (isErr(scanRes)) {
        logger.error({ emoji: "❌", error: scanRes.error })`掃描來源目錄失敗`;
        process.exitCode = 1;
        return;
      }

      const parser = new FileNameParserDefault(config);
      const valid: ParsedFileName[] = [];
      const invalid: FileNameIssue[] = [];
      for (const filePath of scanRes.value) {
        const parsed = parser.parse(filePath);
        if (isOk(parsed)) valid.push(parsed.value);
        else invalid.push(parsed.error);
      }

      const marked = valid.filter((p) => p.suppressLightbox).length;
      logger.info({
        emoji: "🔎",
        valid: valid.length,
        invalid: invalid.length,
        marked,
      })`檢查完成：${valid.length} 個有效檔名，${invalid.length} 個無效`;

      if (invalid.length === 0) return;
      for (const issue of invalid) {
        logger.warn({ emoji: "🚫", reason: issue.reason })`${issue.message}`;
      }
      await new DumpWriterDefault(logger, options.reportDir).dump(
        "check-report",
        invalid
      );
      process.exitCode = 1;
      return;
    });
}

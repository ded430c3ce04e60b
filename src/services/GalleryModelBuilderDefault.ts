import type { PhotoIssue, PhotoRecord } from "@/types";

import { GalleryModel } from "./GalleryModel";
import type {
  GalleryModelBuildResult,
  GalleryModelBuilder,
} from "./GalleryModelBuilder";

function compareText(a: string, b: string) {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export type SortKey = { date: string; fileName: string; path: string };

/** 日期新到舊，同日依檔名、再依來源路徑排序，與掃描順序無關 */
export function compareSortKeys(a: SortKey, b: SortKey) {
  return (
    compareText(b.date, a.date) ||
    compareText(a.fileName, b.fileName) ||
    compareText(a.path, b.path)
  );
}

export function compareRecords(a: PhotoRecord, b: PhotoRecord) {
  return compareSortKeys(
    { date: a.date, fileName: a.fileName, path: a.sourcePath },
    { date: b.date, fileName: b.fileName, path: b.sourcePath }
  );
}

export function duplicateSlugMessage(slug: string, firstFileName: string) {
  return `頁面名稱 ${slug} 與 ${firstFileName} 重複`;
}

/**
 * slug 重複（例如 a.jpg 與 a.png）時保留排序在前者，其餘列為 issue。
 */
export class GalleryModelBuilderDefault implements GalleryModelBuilder {
  build(records: readonly PhotoRecord[]): GalleryModelBuildResult {
    const issues: PhotoIssue[] = [];
    const seen = new Map<string, PhotoRecord>();
    const kept: PhotoRecord[] = [];

    for (const record of [...records].sort(compareRecords)) {
      const first = seen.get(record.slug);
      if (first) {
        issues.push({
          filePath: record.sourcePath,
          type: "DUPLICATE_SLUG",
          message: duplicateSlugMessage(record.slug, first.fileName),
        });
        continue;
      }
      seen.set(record.slug, record);
      kept.push(record);
    }

    return { model: new GalleryModel(kept), issues };
  }
}

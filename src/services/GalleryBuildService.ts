import type { Result } from "~shared/utils/Result";

import type { PhotoIssue, PhotoNotice } from "@/types";

import type { ResizeStats } from "./PhotoRecordService";

export interface GalleryBuildService {
  /** 執行一次完整的網站產生流程 */
  build(): Promise<Result<BuildSummary, BuildError>>;
}

export type BuildSummary = {
  scanned: number;
  photos: number;
  pages: string[];
  feedWritten: boolean;
  resize: ResizeStats;
  /** 被排除的檔案與原因 */
  issues: PhotoIssue[];
  /** 降級處理（例如沒有 EXIF）的檔案 */
  notices: PhotoNotice[];
  warnings: string[];
};

export type BuildError =
  | { type: "SCAN_FAILED"; message: string }
  | { type: "OUTPUT_NOT_WRITABLE"; message: string }
  | { type: "TEMPLATE_RENDER_FAILED"; message: string };

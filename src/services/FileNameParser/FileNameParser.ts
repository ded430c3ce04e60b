import type { Result } from "~shared/utils/Result";

export type ParsedFileName = {
  filePath: string;
  fileName: string;
  /** 不含副檔名的檔名 */
  slug: string;
  extension: string;
  /** yyyy-MM-dd */
  date: string;
  title: string;
  suppressLightbox: boolean;
};

export type FileNameIssueReason =
  | "INVALID_PATTERN"
  | "INVALID_DATE"
  | "EMPTY_TITLE";

export type FileNameIssue = {
  type: "INVALID_FILENAME";
  reason: FileNameIssueReason;
  filePath: string;
  message: string;
};

export interface FileNameParser {
  /**
   * 解析 `YYYY-MM-DD-title-with-dashes.ext` 格式的檔名。
   * 標題中的 `-` 一律轉為空白；等於 marker 的字會被移除並標記 suppressLightbox。
   */
  parse(filePath: string): Result<ParsedFileName, FileNameIssue>;
}

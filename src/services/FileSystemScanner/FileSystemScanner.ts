import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設只掃描最上層 */
  recursive?: boolean;
  allowExts?: readonly string[];
};

export interface FileSystemScanner {
  /** 列出目錄下的檔案，回傳依路徑排序的完整路徑 */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>>;
}

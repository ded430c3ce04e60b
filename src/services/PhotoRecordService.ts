import type { PhotoIssue, PhotoNotice, PhotoRecord } from "@/types";

export interface PhotoRecordService {
  /** 逐一處理檔案：解析檔名、讀 EXIF、發佈原圖與縮圖 */
  collect(filePaths: string[]): Promise<PhotoRecordResult>;
}

export interface PhotoRecordResult {
  records: PhotoRecord[];
  issues: PhotoIssue[];
  notices: PhotoNotice[];
  resize: ResizeStats;
}

export type ResizeStats = {
  resized: number;
  cached: number;
  notNeeded: number;
};

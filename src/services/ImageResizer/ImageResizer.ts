import type { Result } from "~shared/utils/Result";

export type ResizeThreshold = {
  /** 最長邊上限（像素） */
  maxDimension: number;
  /** 檔案大小上限（位元組） */
  maxBytes?: number;
};

export type ImageSize = { width: number; height: number };

export type ResizeOutcome =
  | { status: "NOT_NEEDED"; width: number; height: number }
  | { status: "RESIZED"; outputPath: string; width: number; height: number }
  | { status: "CACHED"; outputPath: string };

export type ResizeError =
  | { type: "IMAGE_DECODE_FAILED"; message: string }
  | { type: "RESIZE_FAILED"; message: string };

export interface ImageResizer {
  /** 只解碼檔頭取得尺寸，不輸出任何檔案 */
  inspect(sourcePath: string): Promise<Result<ImageSize, ResizeError>>;

  /**
   * 來源超過門檻時產生等比例縮小的複本到 targetPath。
   * targetPath 已存在且比來源新時視為快取命中，不重新產生。
   */
  resize(
    sourcePath: string,
    targetPath: string,
    threshold: ResizeThreshold
  ): Promise<Result<ResizeOutcome, ResizeError>>;
}

/** 以門檻值組出縮圖檔名的 key，門檻改變時會產生不同的檔案 */
export function thresholdKey(threshold: ResizeThreshold) {
  const px = `${threshold.maxDimension}px`;
  return threshold.maxBytes ? `${px}-${threshold.maxBytes}b` : px;
}

/** 2021-06-01-sunset.jpg → 2021-06-01-sunset.800px.jpg */
export function resizedFileName(fileName: string, threshold: ResizeThreshold) {
  const dot = fileName.lastIndexOf(".");
  const stem = dot > 0 ? fileName.slice(0, dot) : fileName;
  const ext = dot > 0 ? fileName.slice(dot) : "";
  return `${stem}.${thresholdKey(threshold)}${ext}`;
}

export type GpsCoordinates = {
  latitude: number;
  longitude: number;
};

/** 供顯示用的 EXIF 資訊，不參與分組 */
export type PhotoExif = {
  captureTime?: Date;
  cameraModel?: string;
  lensModel?: string;
  exposureTime?: string;
  aperture?: number;
  iso?: number;
  focalLength?: string;
};

export type PhotoRecord = {
  /** 原始檔案位置 */
  sourcePath: string;
  fileName: string;
  /** 不含副檔名的檔名，也是單張頁面的檔名 */
  slug: string;
  /** yyyy-MM-dd，一律取自檔名 */
  date: string;
  title: string;
  suppressLightbox: boolean;
  exif?: PhotoExif;
  camera?: string;
  gps?: GpsCoordinates;
  /** 相對於輸出目錄的原圖路徑 */
  imagePath: string;
  /** 相對於輸出目錄的縮圖路徑，未縮圖時不存在 */
  resizedPath?: string;
};

export type PhotoIssueType =
  | "INVALID_FILENAME"
  | "IMAGE_DECODE_FAILED"
  | "RESIZE_FAILED"
  | "COPY_FAILED"
  | "DUPLICATE_SLUG";

/** 導致檔案被排除的問題 */
export interface PhotoIssue {
  filePath: string;
  type: PhotoIssueType;
  message: string;
}

/** 不影響收錄、只降級處理的狀況 */
export interface PhotoNotice {
  filePath: string;
  type: "METADATA_READ_FAILED";
  reason: string;
  message: string;
}

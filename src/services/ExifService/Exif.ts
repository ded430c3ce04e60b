import type { GpsCoordinates } from "@/types";

export type Exif = {
  /** 檔案完整路徑 */
  filePath: string;

  /** 拍攝時間 */
  captureTime?: Date;

  /** 相機型號 */
  cameraModel?: string;

  /** 鏡頭名稱 */
  lensModel?: string;

  /** 曝光時間，例如 1/100 */
  exposureTime?: string;

  /** 光圈 */
  aperture?: number;

  /** ISO */
  iso?: number;

  /** 焦距，例如 35.0 mm */
  focalLength?: string;

  /** GPS 座標（十進位度） */
  gps?: GpsCoordinates;
};

export type ReadError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "PARSE_FAILED"; message: string }
  | { type: "NO_EXIF_DATA"; message: string };

import { exiftool } from "exiftool-vendored";

import { type Result, err, ok } from "~shared/utils/Result";

import { exists } from "@/utils/helper";

import type { Exif, ReadError } from "./Exif";
import { getTime } from "./ExifDateTimeHelper";
import { toGpsCoordinates } from "./ExifGpsHelper";
import type { ExifService } from "./ExifService";

export class ExifServiceExifTool implements ExifService {
  async readExif(filePath: string): Promise<Result<Exif, ReadError>> {
    if (!(await exists(filePath))) {
      return err({
        type: "FILE_NOT_FOUND",
        message: `找不到檔案: ${filePath}`,
      });
    }
    try {
      const tags = await exiftool.read(filePath);

      const exif: Exif = {
        filePath,
        captureTime:
          getTime(tags.DateTimeOriginal) ?? getTime(tags.CreateDate),
        cameraModel: text(tags.Model),
        lensModel: text(tags.LensModel),
        exposureTime: text(tags.ExposureTime),
        aperture: numeric(tags.FNumber),
        iso: numeric(tags.ISO),
        focalLength: text(tags.FocalLength),
        gps: toGpsCoordinates({
          latitude: tags.GPSLatitude,
          latitudeRef: tags.GPSLatitudeRef,
          longitude: tags.GPSLongitude,
          longitudeRef: tags.GPSLongitudeRef,
        }),
      };

      const { filePath: _, ...fields } = exif;
      if (Object.values(fields).every((v) => v === undefined)) {
        return err({
          type: "NO_EXIF_DATA",
          message: `無 EXIF 資料: ${filePath}`,
        });
      }
      return ok(exif);
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `讀取 EXIF 失敗: ${filePath}: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }

  async [Symbol.asyncDispose]() {
    await exiftool.end();
  }
}

function text(value: unknown): string | undefined {
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function numeric(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

import { isValid, parse } from "date-fns";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type {
  FileNameIssue,
  FileNameParser,
  ParsedFileName,
} from "./FileNameParser";

export const datedFileNameRegex =
  /^(\d{4})-(\d{2})-(\d{2})-(.+)\.([A-Za-z0-9]+)$/;

/**
 * 檔名即 schema：日期、標題與「小圖」旗標都編在檔名裡。
 * 例如：
 *   2021-06-01-sunset.jpg            → 2021-06-01 / "sunset"
 *   2021-06-02-hike-small-trail.jpg  → 2021-06-02 / "hike trail"，suppressLightbox
 *
 * 標題裡的 `-` 無法與分隔符區分，一律轉成空白。
 */
export class FileNameParserDefault implements FileNameParser {
  private readonly marker: string;

  constructor(deps: { smallImageMarker: string }) {
    this.marker = deps.smallImageMarker.toLowerCase();
  }

  parse(filePath: string): Result<ParsedFileName, FileNameIssue> {
    const fileName = path.basename(filePath);
    const match = datedFileNameRegex.exec(fileName);
    if (!match) {
      return err({
        type: "INVALID_FILENAME",
        reason: "INVALID_PATTERN",
        filePath,
        message: `檔名不符合 YYYY-MM-DD-title.ext 格式: ${fileName}`,
      });
    }

    const [, year, month, day, rawTitle, extension] = match;
    const date = `${year}-${month}-${day}`;
    if (!isValid(parse(date, "yyyy-MM-dd", new Date()))) {
      return err({
        type: "INVALID_FILENAME",
        reason: "INVALID_DATE",
        filePath,
        message: `檔名日期不是有效的日期: ${fileName}`,
      });
    }

    const tokens = rawTitle.split("-");
    const suppressLightbox = tokens.some((t) => t.toLowerCase() === this.marker);
    const title = (
      suppressLightbox
        ? tokens.filter((t) => t.toLowerCase() !== this.marker)
        : tokens
    ).join(" ");
    if (title.trim() === "") {
      return err({
        type: "INVALID_FILENAME",
        reason: "EMPTY_TITLE",
        filePath,
        message: `檔名缺少標題: ${fileName}`,
      });
    }

    return ok({
      filePath,
      fileName,
      slug: path.basename(fileName, path.extname(fileName)),
      extension,
      date,
      title,
      suppressLightbox,
    });
  }
}

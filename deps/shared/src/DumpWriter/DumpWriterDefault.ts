import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  constructor(
    private readonly logger: Logger,
    private readonly dir = "reports"
  ) {}

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const stamp = format(new Date(), "yyyyMMdd-HHmmss");
    const file = path.join(this.dir, `${name}-${stamp}.json`);
    await writeFile(file, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "🗂️", file })`報告已輸出：${file}`;
    return file;
  }
}

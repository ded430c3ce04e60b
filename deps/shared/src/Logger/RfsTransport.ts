import {
  type Options as RfsOptions,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: RfsOptions;
};

/** 以 JSON Lines 寫入可輪替的日誌檔 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    const { context, ...head } = record;
    this.stream.write(JSON.stringify({ ...head, ...context }) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve) => this.stream.end(() => resolve()));
  }
}

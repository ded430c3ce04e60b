import { Feed } from "feed";

import { type Result, err, ok } from "~shared/utils/Result";

import type { GalleryConfig } from "@/config/GalleryConfig";
import { feedFileName, feedGeneratorName } from "@/constants";
import type { PhotoRecord } from "@/types";

import { photoPageHref } from "../PageRenderer/PageContext";
import type { FeedError, FeedGenerator } from "./FeedGenerator";

/** 2021-06-01 → 2021-06-01T00:00:00.000Z */
export function photoDate(record: PhotoRecord) {
  return new Date(`${record.date}T00:00:00.000Z`);
}

export function absoluteUrl(baseUrl: string, href: string) {
  return `${baseUrl.replace(/\/+$/, "")}/${href}`;
}

/**
 * 以 feed 套件輸出 RSS 2.0（或 Atom）。
 * 不放入任何執行當下的時間：更新時間取最新一張相片的日期，輸入不變時輸出也不變。
 */
export class FeedGeneratorFeed implements FeedGenerator {
  private readonly config: GalleryConfig;

  constructor(deps: { config: GalleryConfig }) {
    this.config = deps.config;
  }

  generate(records: readonly PhotoRecord[]): Result<string, FeedError> {
    const { site, feedFormat } = this.config;
    const siteUrl = absoluteUrl(site.baseUrl, "");
    const author = site.author ? { name: site.author } : undefined;
    try {
      const feed = new Feed({
        id: siteUrl,
        title: site.title,
        description: site.description ?? `Feed for ${siteUrl}`,
        link: siteUrl,
        copyright: site.author ? `© ${site.author}` : site.title,
        updated: records.length > 0 ? photoDate(records[0]) : new Date(0),
        generator: feedGeneratorName,
        feedLinks: {
          [feedFormat]: absoluteUrl(site.baseUrl, feedFileName),
        },
        author,
      });

      for (const record of records) {
        const link = absoluteUrl(site.baseUrl, photoPageHref(record));
        feed.addItem({
          title: record.title,
          id: link,
          link,
          date: photoDate(record),
          description: record.camera
            ? `${record.title} (${record.camera})`
            : record.title,
          author: author ? [author] : undefined,
        });
      }

      return ok(feedFormat === "atom" ? feed.atom1() : feed.rss2());
    } catch (e) {
      return err({
        type: "FEED_SERIALIZATION_FAILED",
        message: `產生 feed 失敗: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }
}

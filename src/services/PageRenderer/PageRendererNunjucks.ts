import nunjucks from "nunjucks";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { GalleryConfig } from "@/config/GalleryConfig";
import type { PhotoRecord } from "@/types";

import type { GalleryModel } from "../GalleryModel";
import {
  type LinkView,
  indexPageHref,
  photoPageFile,
  photoPageHref,
  toGroupViews,
  toPhotoView,
  toSiteView,
} from "./PageContext";
import type { PageRenderer, RenderError, RenderedPage } from "./PageRenderer";

export const templateNames = {
  index: "index.njk",
  all: "all.njk",
  photo: "photo.njk",
} as const;

/**
 * 以 nunjucks 樣板輸出頁面：
 * - index.html、index1.html… 分頁列表
 * - all.html 全部相片
 * - <slug>.html 單張相片
 * 所有連結都是相對路徑，輸出目錄可整包搬移。
 */
export class PageRendererNunjucks implements PageRenderer {
  private readonly env: nunjucks.Environment;
  private readonly config: GalleryConfig;
  private readonly logger: Logger;

  constructor(deps: { config: GalleryConfig; logger: Logger }) {
    this.config = deps.config;
    this.logger = deps.logger.extend("PageRendererNunjucks");
    this.env = new nunjucks.Environment(
      new nunjucks.FileSystemLoader(deps.config.templatesDir, {
        noCache: true,
      }),
      { autoescape: true, trimBlocks: true, lstripBlocks: true }
    );
  }

  render(model: GalleryModel): Result<RenderedPage[], RenderError> {
    const site = toSiteView(this.config);
    const pages: RenderedPage[] = [];
    const pageOfSlug = new Map<string, number>();

    for (const page of model.paginate(this.config.pageSize)) {
      for (const record of page.records) pageOfSlug.set(record.slug, page.index);
      const rendered = this.renderTemplate(templateNames.index, {
        site,
        pagination: {
          current: page.index + 1,
          total: page.total,
          previousHref:
            page.index > 0 ? indexPageHref(page.index - 1) : undefined,
          nextHref:
            page.index < page.total - 1
              ? indexPageHref(page.index + 1)
              : undefined,
        },
        groups: toGroupViews(page.groups),
      });
      if (isErr(rendered)) return rendered;
      pages.push({ path: indexPageHref(page.index), content: rendered.value });
    }

    const all = this.renderTemplate(templateNames.all, {
      site,
      count: model.size,
      groups: toGroupViews(model.groups),
    });
    if (isErr(all)) return all;
    pages.push({ path: "all.html", content: all.value });

    for (let i = 0; i < model.records.length; i++) {
      const record = model.records[i];
      const rendered = this.renderTemplate(templateNames.photo, {
        site,
        photo: toPhotoView(record),
        previous: i > 0 ? toLink(model.records[i - 1]) : undefined,
        next:
          i < model.records.length - 1
            ? toLink(model.records[i + 1])
            : undefined,
        indexHref: indexPageHref(pageOfSlug.get(record.slug) ?? 0),
      });
      if (isErr(rendered)) return rendered;
      pages.push({ path: photoPageFile(record), content: rendered.value });
    }

    this.logger.debug({ emoji: "🧾" })`已產生 ${pages.length} 個頁面`;
    return ok(pages);
  }

  private renderTemplate(
    template: string,
    context: object
  ): Result<string, RenderError> {
    try {
      return ok(this.env.render(template, context));
    } catch (e) {
      return err({
        type: "TEMPLATE_RENDER_FAILED",
        template,
        message: `樣板 ${template} 產生失敗: ${e instanceof Error ? e.message : String(e)}`,
      });
    }
  }
}

function toLink(record: PhotoRecord): LinkView {
  return { href: photoPageHref(record), title: record.title };
}

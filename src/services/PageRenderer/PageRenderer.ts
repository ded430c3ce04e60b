import type { Result } from "~shared/utils/Result";

import type { GalleryModel } from "../GalleryModel";

export type RenderedPage = {
  /** 相對於輸出目錄的路徑 */
  path: string;
  content: string;
};

export type RenderError = {
  type: "TEMPLATE_RENDER_FAILED";
  template: string;
  message: string;
};

export interface PageRenderer {
  /** 產生所有頁面內容，任一樣板失敗即整體失敗 */
  render(model: GalleryModel): Result<RenderedPage[], RenderError>;
}

import type { PhotoIssue, PhotoRecord } from "@/types";

import type { GalleryModel } from "./GalleryModel";

export interface GalleryModelBuilder {
  build(records: readonly PhotoRecord[]): GalleryModelBuildResult;
}

export interface GalleryModelBuildResult {
  model: GalleryModel;
  issues: PhotoIssue[];
}

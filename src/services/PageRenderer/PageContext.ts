import type { GalleryConfig } from "@/config/GalleryConfig";
import { feedFileName } from "@/constants";
import type { PhotoRecord } from "@/types";

import type { DateGroup } from "../GalleryModel";
import {
  formatAperture,
  formatCaptureTime,
  formatCoordinate,
  formatExposureTime,
  formatFocalLength,
  formatIso,
} from "./ExifFormat";

export type PhotoView = {
  slug: string;
  title: string;
  date: string;
  /** 單張頁面 */
  href: string;
  /** 列表上顯示的圖：有縮圖用縮圖，否則用原圖 */
  imageSrc: string;
  /** 原圖 */
  fullSrc: string;
  /** false 時直接顯示原圖，不套縮圖 / lightbox */
  lightbox: boolean;
  camera?: string;
  lens?: string;
  exposure?: string;
  aperture?: string;
  iso?: string;
  focalLength?: string;
  captureTime?: string;
  gps?: { latitude: string; longitude: string; mapUrl: string };
};

export type GroupView = {
  date: string;
  photos: PhotoView[];
};

export type SiteView = {
  title: string;
  description?: string;
  author?: string;
  feedHref: string;
};

export type LinkView = { href: string; title: string };

/** 單張頁面寫到磁碟上的檔名 */
export function photoPageFile(record: PhotoRecord) {
  return `${record.slug}.html`;
}

/** 網站內的相對連結，每段路徑都跳脫（檔名可能含 #、?、%） */
export function toHref(sitePath: string) {
  return sitePath.split("/").map(encodeURIComponent).join("/");
}

export function photoPageHref(record: PhotoRecord) {
  return toHref(photoPageFile(record));
}

/** 第一頁為 index.html，之後為 index1.html、index2.html… */
export function indexPageHref(pageIndex: number) {
  return pageIndex === 0 ? "index.html" : `index${pageIndex}.html`;
}

export function toSiteView(config: GalleryConfig): SiteView {
  return {
    title: config.site.title,
    description: config.site.description,
    author: config.site.author,
    feedHref: feedFileName,
  };
}

export function toPhotoView(record: PhotoRecord): PhotoView {
  const exif = record.exif;
  const lightbox = !record.suppressLightbox;
  return {
    slug: record.slug,
    title: record.title,
    date: record.date,
    href: photoPageHref(record),
    imageSrc: toHref(
      lightbox && record.resizedPath ? record.resizedPath : record.imagePath
    ),
    fullSrc: toHref(record.imagePath),
    lightbox,
    camera: record.camera,
    lens: exif?.lensModel,
    exposure: exif?.exposureTime && formatExposureTime(exif.exposureTime),
    aperture: exif?.aperture !== undefined ? formatAperture(exif.aperture) : undefined,
    iso: exif?.iso !== undefined ? formatIso(exif.iso) : undefined,
    focalLength: exif?.focalLength && formatFocalLength(exif.focalLength),
    captureTime: exif?.captureTime && formatCaptureTime(exif.captureTime),
    gps: record.gps && {
      latitude: formatCoordinate(record.gps.latitude),
      longitude: formatCoordinate(record.gps.longitude),
      mapUrl: `https://www.openstreetmap.org/?mlat=${record.gps.latitude}&mlon=${record.gps.longitude}#map=15/${record.gps.latitude}/${record.gps.longitude}`,
    },
  };
}

export function toGroupViews(groups: readonly DateGroup[]): GroupView[] {
  return groups.map((g) => ({
    date: g.date,
    photos: g.records.map(toPhotoView),
  }));
}

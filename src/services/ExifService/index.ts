export * from "./Exif";
export * from "./ExifDateTimeHelper";
export * from "./ExifGpsHelper";
export * from "./ExifService";
export * from "./ExifServiceExifTool";

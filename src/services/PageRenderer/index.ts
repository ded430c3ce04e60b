export * from "./ExifFormat";
export * from "./PageContext";
export * from "./PageRenderer";
export * from "./PageRendererNunjucks";

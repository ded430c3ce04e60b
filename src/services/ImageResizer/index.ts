export * from "./ImageResizer";
export * from "./ImageResizerSharp";

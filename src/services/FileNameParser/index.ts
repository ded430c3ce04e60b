export * from "./FileNameParser";
export * from "./FileNameParserDefault";

export * from "./namer";
export * from "./pdfTitle";

export * from "./generateIndexPage";

export * from "./build";
export * from "./levenshtein";
export * from "./lexical";
export * from "./similarity-index";

export * from "./classifier";
export * from "./rules";

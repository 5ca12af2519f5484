export * from "./errors";
export * from "./manager";

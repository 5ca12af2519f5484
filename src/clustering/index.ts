export * from "./engine";
export * from "./prefilter";
export * from "./store";

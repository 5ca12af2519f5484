export * from "./ages";
export * from "./runner";
export * from "./status";
export * from "./summary";
export * from "./worker";

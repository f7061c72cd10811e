export * from "./errors";
export * from "./logger";
export * from "./models";
export * from "./resources";
export * from "./secrets";
export * from "./session";
export * from "./time_entry";
export * from "./timestamps";
export * from "./transport";

export * from "./guards";
export * from "./invoke";
export * from "./messages";
export * from "./tools";

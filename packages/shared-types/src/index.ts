export * from "./approval";
export * from "./events";
export * from "./session";

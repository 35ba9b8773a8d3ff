export { createApp } from "./app";
export { ActiveExchanges } from "./exchanges";
export { type ParsedBody, parseJsonBody } from "./http";

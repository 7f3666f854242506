export * from "./html/adapter";
export * from "./http/backoff";
export * from "./http/fetcher";
export { iomSource } from "./iom";
export * from "./registry";
export { sdgfundSource } from "./sdgfund";
export type * from "./types";
export { undesaSource } from "./undesa";
export { undpSource } from "./undp";

export * from "./config/harvest_env";
export * from "./config/load_dotenv";
export * from "./errors";
export * from "./logging";
export type * from "./types/document";
export * from "./types/run";
export * from "./utils/hash";
export * from "./utils/page_range";
export * from "./utils/url_canonicalize";

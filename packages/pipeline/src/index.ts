export * from "./sink/filesystem";
export type * from "./sink/types";
export * from "./stages/harvest";

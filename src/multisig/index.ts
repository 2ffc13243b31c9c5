export * from "./address";
export * from "./config";
export * from "./constants";
export * from "./encoding";
export * from "./errors";
export * from "./hash";
export * from "./keys";
export * from "./order";
export * from "./permutations";
export type * from "./types";

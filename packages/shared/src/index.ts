export * from "./constants";
export * from "./protocol";
export type * from "./events";
export type * from "./types";

export * from "./types/invoice";
export type * from "./types/api";

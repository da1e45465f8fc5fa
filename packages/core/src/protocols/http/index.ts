export * from "./http.protocol";
export type * from "./http.types";

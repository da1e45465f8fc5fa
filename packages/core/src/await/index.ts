export * from "./await-until";

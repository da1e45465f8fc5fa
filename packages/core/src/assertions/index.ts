export * from "./response-assertions";

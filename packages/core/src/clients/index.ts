export * from "./resource-client";
export * from "./pet.client";
export * from "./user.client";
export * from "./store.client";
export * from "./create-clients";

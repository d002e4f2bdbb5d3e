export * from "./base";
export * from "./users";
export * from "./api-keys";
export * from "./categories";

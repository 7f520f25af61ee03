export * from "./auth";
export * from "./moderation";
export * from "./validation";

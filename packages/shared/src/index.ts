export * from "./types/password.js";
export * from "./types/cli.js";

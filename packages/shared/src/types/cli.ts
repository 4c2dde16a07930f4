import type { CharacterCategory } from "./password.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Defaults resolved from the environment and the optional YAML file,
 * before command line flags are applied
 */
export interface CliDefaults {
  length: number;
  count: number;
  symbols: string;
  allowAmbiguous: boolean;
  exclude: CharacterCategory[];
  logLevel: LogLevel;
}

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { CliDefaults } from "@passforge/shared";
import { ConfigError } from "../errors.js";
import { DEFAULT_SYMBOLS } from "./charsets.js";
import { CharacterCategorySchema, MAX_COUNT, MAX_LENGTH, SymbolSetSchema } from "./generation.js";

export const DEFAULT_CONFIG_FILE = "genpw.yaml";

export const BUILT_IN_DEFAULTS: CliDefaults = {
  length: 16,
  count: 1,
  symbols: DEFAULT_SYMBOLS,
  allowAmbiguous: false,
  exclude: [],
  logLevel: "info",
};

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const ConfigFileSchema = z
  .object({
    length: z.number().int().min(1).max(MAX_LENGTH).optional(),
    count: z.number().int().min(1).max(MAX_COUNT).optional(),
    symbols: SymbolSetSchema.optional(),
    allowAmbiguous: z.boolean().optional(),
    exclude: z.array(CharacterCategorySchema).optional(),
    logLevel: LogLevelSchema.optional(),
  })
  .strict();

const EnvSchema = z.object({
  GENPW_LENGTH: z.coerce.number().int().min(1).max(MAX_LENGTH).optional(),
  GENPW_COUNT: z.coerce.number().int().min(1).max(MAX_COUNT).optional(),
  GENPW_SYMBOLS: SymbolSetSchema.optional(),
  GENPW_ALLOW_AMBIGUOUS: z
    .enum(["true", "false"])
    .transform((value) => value === "true")
    .optional(),
  GENPW_LOG_LEVEL: LogLevelSchema.optional(),
  GENPW_CONFIG: z.string().min(1).optional(),
});

export interface LoadDefaultsOptions {
  /** Explicit config file; a missing file is an error */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function readConfigFile(path: string): z.infer<typeof ConfigFileSchema> {
  let content: unknown;
  try {
    content = yaml.load(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty file is an empty config
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    throw ConfigError.fromZod(result.error, path);
  }
  return result.data;
}

/**
 * Resolve defaults for the command line flags.
 *
 * Built-in values are overridden by GENPW_* environment variables, which are
 * in turn overridden by the YAML config file. The file is the one given
 * explicitly, else GENPW_CONFIG, else `genpw.yaml` in the working directory
 * when it exists.
 */
export function loadCliDefaults(options: LoadDefaultsOptions = {}): CliDefaults {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  // Only our own variables; the rest of the environment is not validated
  const envResult = EnvSchema.safeParse({
    GENPW_LENGTH: env.GENPW_LENGTH || undefined,
    GENPW_COUNT: env.GENPW_COUNT || undefined,
    GENPW_SYMBOLS: env.GENPW_SYMBOLS || undefined,
    GENPW_ALLOW_AMBIGUOUS: env.GENPW_ALLOW_AMBIGUOUS || undefined,
    GENPW_LOG_LEVEL: env.GENPW_LOG_LEVEL || undefined,
    GENPW_CONFIG: env.GENPW_CONFIG || undefined,
  });
  if (!envResult.success) {
    throw ConfigError.fromZod(envResult.error, "environment");
  }
  const fromEnv = envResult.data;

  const defaults: CliDefaults = {
    length: fromEnv.GENPW_LENGTH ?? BUILT_IN_DEFAULTS.length,
    count: fromEnv.GENPW_COUNT ?? BUILT_IN_DEFAULTS.count,
    symbols: fromEnv.GENPW_SYMBOLS ?? BUILT_IN_DEFAULTS.symbols,
    allowAmbiguous: fromEnv.GENPW_ALLOW_AMBIGUOUS ?? BUILT_IN_DEFAULTS.allowAmbiguous,
    exclude: [...BUILT_IN_DEFAULTS.exclude],
    logLevel: fromEnv.GENPW_LOG_LEVEL ?? BUILT_IN_DEFAULTS.logLevel,
  };

  const explicitFile = options.configFile ?? fromEnv.GENPW_CONFIG;
  const configFile = resolve(cwd, explicitFile ?? DEFAULT_CONFIG_FILE);

  if (!existsSync(configFile)) {
    if (explicitFile) {
      throw new ConfigError(`Config file not found: ${configFile}`);
    }
    return defaults;
  }

  const fileConfig = readConfigFile(configFile);
  return {
    length: fileConfig.length ?? defaults.length,
    count: fileConfig.count ?? defaults.count,
    symbols: fileConfig.symbols ?? defaults.symbols,
    allowAmbiguous: fileConfig.allowAmbiguous ?? defaults.allowAmbiguous,
    exclude: fileConfig.exclude ?? defaults.exclude,
    logLevel: fileConfig.logLevel ?? defaults.logLevel,
  };
}

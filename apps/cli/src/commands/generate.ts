import { Command, Option } from "commander";
import chalk from "chalk";
import type { CharacterCategory, GeneratedPassword } from "@passforge/shared";
import { loadCliDefaults } from "../config/defaults.js";
import { createGenerationConfig } from "../config/generation.js";
import { CHARACTER_CATEGORIES } from "../config/charsets.js";
import { PasswordGenerator } from "../services/generator.js";
import type { RandomSource } from "../services/random-source.js";
import { createLogger, isLogLevel, LOG_LEVELS, type OutputStream } from "../utils/logger.js";

export interface GenerateContext {
  stdout: OutputStream;
  stderr: OutputStream;
  env: NodeJS.ProcessEnv;
  cwd: string;
  random?: RandomSource;
}

interface GenerateOptions {
  length?: string;
  count?: string;
  lower?: boolean;
  upper?: boolean;
  digits?: boolean;
  symbols?: boolean;
  symbolSet?: string;
  allowAmbiguous?: boolean;
  config?: string;
  logLevel?: string;
  verbose?: boolean;
}

function formatPassword(password: GeneratedPassword, verbose: boolean): string {
  if (!verbose) {
    return password.value;
  }
  return `${password.value}  ${chalk.gray(`(${password.entropyBits.toFixed(2)} bits)`)}`;
}

// An explicit --<category> or --no-<category> wins over the configured exclusions
function selectedCategories(options: GenerateOptions, exclude: readonly CharacterCategory[]): CharacterCategory[] {
  const flags: Record<CharacterCategory, boolean | undefined> = {
    lowercase: options.lower,
    uppercase: options.upper,
    digits: options.digits,
    symbols: options.symbols,
  };
  return CHARACTER_CATEGORIES.filter((category) => flags[category] ?? !exclude.includes(category));
}

/**
 * Attach the generation flags and action to the root program
 */
export function registerGenerateCommand(program: Command, context: GenerateContext): void {
  program
    .option("-l, --length <n>", "Password length (default: 16)")
    .option("-c, --count <n>", "How many passwords to generate (default: 1)")
    .option("--lower", "Include lowercase letters, even if excluded by config")
    .option("--no-lower", "Exclude lowercase letters")
    .option("--upper", "Include uppercase letters, even if excluded by config")
    .option("--no-upper", "Exclude uppercase letters")
    .option("--digits", "Include digits, even if excluded by config")
    .option("--no-digits", "Exclude digits")
    .option("--symbols", "Include symbols, even if excluded by config")
    .option("--no-symbols", "Exclude symbols")
    .option("--symbol-set <chars>", "Use a custom symbol set")
    .option("--allow-ambiguous", "Allow visually confusable characters (I l 1 O 0 o | ` ~ ' \" and space)")
    .option("--no-allow-ambiguous", "Exclude visually confusable characters, even if allowed by config")
    .option("--config <file>", "YAML config file (default: ./genpw.yaml if present)")
    .addOption(new Option("--log-level <level>", "Log level for diagnostics on stderr").choices(LOG_LEVELS))
    .option("-v, --verbose", "Debug logging and entropy per password")
    .action((options: GenerateOptions) => {
      const defaults = loadCliDefaults({
        configFile: options.config,
        env: context.env,
        cwd: context.cwd,
      });

      const requestedLevel = options.logLevel ?? defaults.logLevel;
      const logLevel = options.verbose ? "debug" : isLogLevel(requestedLevel) ? requestedLevel : defaults.logLevel;
      const logger = createLogger(logLevel, context.stderr);
      if (options.verbose) {
        logger.debug("Verbose mode enabled");
      }

      const config = createGenerationConfig({
        length: options.length ?? defaults.length,
        count: options.count ?? defaults.count,
        categories: selectedCategories(options, defaults.exclude),
        allowAmbiguous: options.allowAmbiguous ?? defaults.allowAmbiguous,
        symbols: options.symbolSet ?? defaults.symbols,
      });

      logger.debug(
        `Resolved config: length=${config.length}, count=${config.count}, categories=${config.categories.join(",")}, allowAmbiguous=${config.allowAmbiguous}`
      );

      const generator = new PasswordGenerator(context.random, logger);
      const passwords = generator.generate(config);

      for (const password of passwords) {
        context.stdout.write(`${formatPassword(password, options.verbose === true)}\n`);
      }
    });
}

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { registerGenerateCommand, type GenerateContext } from "./commands/generate.js";
import { ConfigError } from "./errors.js";
import { createLogger } from "./utils/logger.js";

export type CliContext = GenerateContext;

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name("genpw")
    .description("Generate cryptographically strong passwords")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({
      writeOut: (str) => context.stdout.write(str),
      writeErr: (str) => context.stderr.write(str),
      outputError: (str, write) => write(chalk.red(str)),
    });

  registerGenerateCommand(program, context);
  return program;
}

/**
 * Run the program against `argv` (user arguments only) and return the exit
 * code. Output goes through the context's streams.
 */
export function runCli(argv: readonly string[], context: Partial<CliContext> = {}): number {
  const resolved: CliContext = {
    stdout: context.stdout ?? process.stdout,
    stderr: context.stderr ?? process.stderr,
    env: context.env ?? process.env,
    cwd: context.cwd ?? process.cwd(),
    random: context.random,
  };

  try {
    createProgram(resolved).parse([...argv], { from: "user" });
    return 0;
  } catch (error) {
    // Help, version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    // Error is the highest level, so failures show whatever --log-level says
    const logger = createLogger("error", resolved.stderr);
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

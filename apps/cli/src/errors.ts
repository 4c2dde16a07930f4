import type { ZodError } from "zod";

/**
 * Raised for any configuration the generator cannot honour: bad length or
 * count, an empty category or pool, an unreadable config file.
 */
export class ConfigError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = "ConfigError";
    this.field = field;
  }

  /**
   * Convert the first zod issue into a ConfigError naming the field
   */
  static fromZod(error: ZodError, source?: string): ConfigError {
    const issue = error.issues[0];
    if (!issue) {
      return new ConfigError(source ? `Invalid ${source}` : "Invalid configuration");
    }

    const field = issue.path.join(".");
    const subject = [source, field].filter(Boolean).join(": ");
    const message = subject ? `${subject} ${issue.message}` : issue.message;
    return new ConfigError(message, field || undefined);
  }
}

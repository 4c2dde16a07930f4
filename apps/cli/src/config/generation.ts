import { z } from "zod";
import type { CharacterCategory, GenerationConfig } from "@passforge/shared";
import { ConfigError } from "../errors.js";
import { CHARACTER_CATEGORIES } from "./charsets.js";

export const MAX_LENGTH = 4096;
export const MAX_COUNT = 10000;

export const CharacterCategorySchema = z.enum(["lowercase", "uppercase", "digits", "symbols"]);

// Printable ASCII without space
export const SymbolSetSchema = z
  .string()
  .regex(/^[\x21-\x7e]*$/, "must contain printable ASCII characters only");

const positiveInt = (max: number) =>
  z.coerce
    .number({ invalid_type_error: "must be a number" })
    .int("must be an integer")
    .min(1, "must be at least 1")
    .max(max, `must be at most ${max}`);

const GenerationConfigSchema = z
  .object({
    length: positiveInt(MAX_LENGTH),
    count: positiveInt(MAX_COUNT),
    categories: z
      .array(CharacterCategorySchema)
      .min(1, "must include at least one of lowercase, uppercase, digits or symbols")
      .refine((categories) => new Set(categories).size === categories.length, {
        message: "must not contain duplicates",
      }),
    allowAmbiguous: z.boolean(),
    symbols: SymbolSetSchema,
  })
  .superRefine((config, ctx) => {
    if (config.length < config.categories.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["length"],
        message: `must be at least ${config.categories.length} (one character per selected category)`,
      });
    }
  });

export interface GenerationConfigInput {
  length: number | string;
  count: number | string;
  categories: readonly CharacterCategory[];
  allowAmbiguous: boolean;
  symbols: string;
}

/**
 * Validated constructor for GenerationConfig. Numeric fields may arrive as
 * strings straight from the command line.
 */
export function createGenerationConfig(input: GenerationConfigInput): GenerationConfig {
  const result = GenerationConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZod(result.error);
  }

  const config = result.data;
  return {
    ...config,
    categories: CHARACTER_CATEGORIES.filter((category) => config.categories.includes(category)),
  };
}

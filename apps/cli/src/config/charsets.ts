import type { CharacterCategory } from "@passforge/shared";

export const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
export const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const DIGITS = "0123456789";
export const DEFAULT_SYMBOLS = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

/**
 * Canonical category order; pools and mandatory characters follow it
 */
export const CHARACTER_CATEGORIES: readonly CharacterCategory[] = [
  "lowercase",
  "uppercase",
  "digits",
  "symbols",
];

// Visually confusable glyphs, dropped unless ambiguous characters are allowed
export const AMBIGUOUS_CHARACTERS: ReadonlySet<string> = new Set("Il1O0o|`~'\" ");

/**
 * Character set for a category. `symbols` can be replaced with a custom set.
 */
export function getCharacterSet(category: CharacterCategory, symbols: string = DEFAULT_SYMBOLS): string {
  switch (category) {
    case "lowercase":
      return LOWERCASE;
    case "uppercase":
      return UPPERCASE;
    case "digits":
      return DIGITS;
    case "symbols":
      return symbols;
  }
}

import type { CharacterCategory, CharacterPool } from "@passforge/shared";
import { AMBIGUOUS_CHARACTERS, CHARACTER_CATEGORIES, DEFAULT_SYMBOLS, getCharacterSet } from "../config/charsets.js";
import { ConfigError } from "../errors.js";

function filterAmbiguous(characters: string, allowAmbiguous: boolean): string {
  if (allowAmbiguous) {
    return characters;
  }
  return Array.from(characters)
    .filter((ch) => !AMBIGUOUS_CHARACTERS.has(ch))
    .join("");
}

function unique(characters: string): string {
  return Array.from(new Set(characters)).join("");
}

/**
 * Assemble the character pool for a set of categories.
 *
 * Each active category keeps its own (filtered) character set so the
 * generator can draw one mandatory character from it; `characters` is the
 * sorted, duplicate-free union of all of them.
 */
export function buildPool(
  categories: readonly CharacterCategory[],
  allowAmbiguous: boolean,
  symbols: string = DEFAULT_SYMBOLS
): CharacterPool {
  if (categories.length === 0) {
    throw new ConfigError(
      "No character categories selected: enable at least one of lowercase, uppercase, digits or symbols",
      "categories"
    );
  }

  const active = CHARACTER_CATEGORIES.filter((category) => categories.includes(category));
  const sets = active.map((category) => ({
    category,
    characters: unique(filterAmbiguous(getCharacterSet(category, symbols), allowAmbiguous)),
  }));

  for (const { category, characters } of sets) {
    if (characters.length === 0) {
      throw new ConfigError(
        `The ${category} category has no characters left; use --allow-ambiguous or choose a different set`,
        "categories"
      );
    }
  }

  const characters = Array.from(new Set(sets.map((set) => set.characters).join("")))
    .sort()
    .join("");

  return {
    characters,
    categories: sets,
    size: characters.length,
  };
}

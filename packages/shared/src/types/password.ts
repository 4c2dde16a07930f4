/**
 * Character classes a password can draw from
 */
export type CharacterCategory = "lowercase" | "uppercase" | "digits" | "symbols";

/**
 * Validated input for a generation run
 */
export interface GenerationConfig {
  /** Characters per password, never less than the number of categories */
  length: number;
  /** Number of passwords to produce */
  count: number;
  /** Active categories, duplicate-free */
  categories: CharacterCategory[];
  /** Keep visually confusable characters (O/0, l/1, ...) in the pool */
  allowAmbiguous: boolean;
  /** Symbol set used when the symbols category is active */
  symbols: string;
}

/**
 * Characters available to a generation run
 */
export interface CharacterPool {
  /** Sorted, duplicate-free union of every active category */
  characters: string;
  /** Filtered character set per active category */
  categories: ReadonlyArray<{ category: CharacterCategory; characters: string }>;
  size: number;
}

/**
 * A single generated password
 */
export interface GeneratedPassword {
  readonly value: string;
  readonly entropyBits: number;
}

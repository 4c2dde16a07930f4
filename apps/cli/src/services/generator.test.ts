import { describe, it, expect, vi } from "vitest";
import type { CharacterCategory, GenerationConfig } from "@passforge/shared";
import { PasswordGenerator } from "./generator.js";
import { buildPool } from "./pool.js";
import { estimateEntropy } from "./entropy.js";
import type { RandomSource } from "./random-source.js";
import { ConfigError } from "../errors.js";
import { CHARACTER_CATEGORIES } from "../config/charsets.js";
import type { Logger } from "../utils/logger.js";

const firstSource: RandomSource = { randomInt: () => 0 };
const lastSource: RandomSource = { randomInt: (max) => max - 1 };

function makeConfig(overrides: Partial<GenerationConfig> = {}): GenerationConfig {
  return {
    length: 16,
    count: 1,
    categories: ["lowercase", "uppercase", "digits", "symbols"],
    allowAmbiguous: false,
    symbols: "!#$%&*+-=?@^_",
    ...overrides,
  };
}

// Every non-empty subset of the categories
function categoryCombinations(): CharacterCategory[][] {
  const combos: CharacterCategory[][] = [];
  for (let mask = 1; mask < 1 << CHARACTER_CATEGORIES.length; mask++) {
    combos.push(CHARACTER_CATEGORIES.filter((_, index) => (mask & (1 << index)) !== 0));
  }
  return combos;
}

describe("PasswordGenerator", () => {
  it("builds a three character password with one character per category", () => {
    const generator = new PasswordGenerator(firstSource);
    const [password] = generator.generate(
      makeConfig({ length: 3, categories: ["uppercase", "lowercase", "digits"], allowAmbiguous: true })
    );

    expect(password?.value).toBe("A0a");
  });

  it("draws mandatory characters from the filtered category sets", () => {
    const categories: CharacterCategory[] = ["uppercase", "lowercase", "digits"];

    expect(new PasswordGenerator(firstSource).generate(makeConfig({ length: 3, categories }))[0]?.value).toBe(
      "A2a"
    );
    expect(new PasswordGenerator(lastSource).generate(makeConfig({ length: 3, categories }))[0]?.value).toBe(
      "zZ9"
    );
  });

  it("fills the remaining positions from the full pool", () => {
    const generator = new PasswordGenerator(lastSource);
    const [password] = generator.generate(makeConfig({ length: 5, categories: ["digits"] }));

    expect(password?.value).toBe("99999");
  });

  it("returns the requested number of frozen passwords with their entropy", () => {
    const config = makeConfig({ length: 20, count: 5 });
    const passwords = new PasswordGenerator().generate(config);
    const expectedEntropy = estimateEntropy(20, buildPool(config.categories, false, config.symbols).size);

    expect(passwords).toHaveLength(5);
    for (const password of passwords) {
      expect(Object.isFrozen(password)).toBe(true);
      expect(password.entropyBits).toBe(expectedEntropy);
    }
  });

  it("produces passwords of the requested length covering every active category", () => {
    const generator = new PasswordGenerator();

    for (const categories of categoryCombinations()) {
      for (const allowAmbiguous of [true, false]) {
        const pool = buildPool(categories, allowAmbiguous);

        for (const length of [categories.length, categories.length + 1, 12, 64]) {
          const passwords = generator.generate({
            length,
            count: 3,
            categories,
            allowAmbiguous,
            symbols: "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~",
          });

          for (const { value } of passwords) {
            expect(value).toHaveLength(length);
            for (const ch of value) {
              expect(pool.characters).toContain(ch);
            }
            for (const set of pool.categories) {
              expect(Array.from(value).some((ch) => set.characters.includes(ch))).toBe(true);
            }
          }
        }
      }
    }
  });

  it("never emits ambiguous characters unless allowed", () => {
    const passwords = new PasswordGenerator().generate(makeConfig({ length: 200, count: 10 }));

    for (const { value } of passwords) {
      expect(value).not.toMatch(/[O0l1I]/);
    }
  });

  it("rejects a length shorter than the number of categories", () => {
    const generator = new PasswordGenerator(firstSource);

    expect(() => generator.generate(makeConfig({ length: 3 }))).toThrow(ConfigError);
    expect(() => generator.generate(makeConfig({ length: 3 }))).toThrow(/at least 4/);
  });

  it("rejects a count below one", () => {
    const generator = new PasswordGenerator(firstSource);

    expect(() => generator.generate(makeConfig({ count: 0 }))).toThrow(ConfigError);
  });

  it("rejects an empty category list", () => {
    const generator = new PasswordGenerator(firstSource);

    expect(() => generator.generate(makeConfig({ categories: [] }))).toThrow(ConfigError);
  });

  it("fails loudly when the random source goes out of range", () => {
    const broken: RandomSource = { randomInt: (max) => max };
    const generator = new PasswordGenerator(broken);

    expect(() => generator.generate(makeConfig())).toThrow(RangeError);
  });

  it("logs the pool size at debug level and a summary at info level", () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    new PasswordGenerator(firstSource, logger).generate(makeConfig({ categories: ["digits"], length: 4 }));

    expect(logger.debug).toHaveBeenCalledWith("Pool has 8 characters across 1 categories");
    expect(logger.info).toHaveBeenCalledWith("Generating 1 password(s) of length 4 from 8 characters");
  });
});

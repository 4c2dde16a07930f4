import type { CharacterPool, GeneratedPassword, GenerationConfig } from "@passforge/shared";
import { ConfigError } from "../errors.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { estimateEntropy } from "./entropy.js";
import { buildPool } from "./pool.js";
import { cryptoRandomSource, type RandomSource } from "./random-source.js";

export class PasswordGenerator {
  private random: RandomSource;
  private logger: Logger;

  constructor(random: RandomSource = cryptoRandomSource, logger: Logger = silentLogger) {
    this.random = random;
    this.logger = logger;
  }

  /**
   * Generate `config.count` passwords.
   *
   * Each password gets one character from every active category, the rest
   * from the full pool, and is then shuffled. Nothing is returned unless
   * every password could be built.
   */
  generate(config: GenerationConfig): GeneratedPassword[] {
    const pool = buildPool(config.categories, config.allowAmbiguous, config.symbols);

    if (!Number.isInteger(config.length) || config.length < pool.categories.length) {
      throw new ConfigError(
        `Password length must be an integer of at least ${pool.categories.length} (one character per selected category), got ${config.length}`,
        "length"
      );
    }
    if (!Number.isInteger(config.count) || config.count < 1) {
      throw new ConfigError(`Password count must be a positive integer, got ${config.count}`, "count");
    }

    this.logger.debug(`Pool has ${pool.size} characters across ${pool.categories.length} categories`);
    this.logger.info(
      `Generating ${config.count} password(s) of length ${config.length} from ${pool.size} characters`
    );

    const entropyBits = estimateEntropy(config.length, pool.size);
    const passwords: GeneratedPassword[] = [];

    for (let i = 0; i < config.count; i++) {
      passwords.push(Object.freeze({ value: this.generateOne(config.length, pool), entropyBits }));
    }

    return passwords;
  }

  private generateOne(length: number, pool: CharacterPool): string {
    // One mandatory character per category
    const chars = pool.categories.map((set) => this.pick(set.characters));

    while (chars.length < length) {
      chars.push(this.pick(pool.characters));
    }

    this.shuffle(chars);
    return chars.join("");
  }

  private pick(characters: string): string {
    const index = this.random.randomInt(characters.length);
    const ch = characters.charAt(index);
    if (!Number.isInteger(index) || ch === "") {
      throw new RangeError(`Random source returned ${index}, expected an integer in [0, ${characters.length})`);
    }
    return ch;
  }

  // Fisher-Yates
  private shuffle(items: string[]): void {
    for (let i = items.length - 1; i > 0; i--) {
      const j = this.random.randomInt(i + 1);
      const a = items[i];
      const b = items[j];
      if (a === undefined || b === undefined) {
        throw new RangeError(`Random source returned ${j}, expected an integer in [0, ${i + 1})`);
      }
      items[i] = b;
      items[j] = a;
    }
  }
}

import crypto from "crypto";

/**
 * Source of uniformly distributed floats in [0, 1)
 */
export interface RandomSource {
  next(): number;
}

/** Park-Miller multiplier */
const LCG_MULTIPLIER = 48271;
/** Mersenne prime 2^31 - 1 */
const LCG_MODULUS = 2147483647;

export function hashStringToSeed(seed: string): number {
  // Convert seed string to SHA-256 hash
  const hash = crypto.createHash("sha256").update(seed).digest("hex");

  // Convert first 8 characters of hash to numeric seed
  return parseInt(hash.slice(0, 8), 16);
}

export function generateRandomSeed(): number {
  return crypto.randomBytes(4).readUInt32BE(0);
}

/**
 * Seeded Park-Miller generator; the same seed always yields the same sequence
 */
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    // State must lie in [1, LCG_MODULUS - 1]
    this.state = (Math.abs(Math.trunc(seed)) % (LCG_MODULUS - 1)) + 1;
  }

  next(): number {
    this.state = (this.state * LCG_MULTIPLIER) % LCG_MODULUS;
    return (this.state - 1) / (LCG_MODULUS - 1);
  }
}

/**
 * Create the randomness source for a reservoir.
 * Without a seed the generator is seeded from OS entropy, so runs differ.
 */
export function createRandomSource(seed?: string | number): RandomSource {
  if (seed === undefined) {
    return new SeededRandom(generateRandomSeed());
  }
  return new SeededRandom(
    typeof seed === "number" ? seed : hashStringToSeed(seed),
  );
}

/**
 * Entropy in bits of a password of `length` characters drawn uniformly
 * from a pool of `poolSize` characters: length * log2(poolSize).
 */
export function estimateEntropy(length: number, poolSize: number): number {
  if (length <= 0 || poolSize <= 1) {
    return 0;
  }
  return length * Math.log2(poolSize);
}

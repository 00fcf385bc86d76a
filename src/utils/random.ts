export type RandomSource = () => number;

/**
 * Pick `count` items uniformly at random without replacement (partial Fisher-Yates).
 * The input is left untouched; the result is in draw order.
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  const pool = [...items];
  const take = Math.max(0, Math.min(count, pool.length));

  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }

  return pool.slice(0, take);
}

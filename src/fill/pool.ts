/**
 * Immutable letter multiset carried alongside every fill board state
 */

import { LetterPool } from '../model/types';

export function createPool(letters: Iterable<string>): LetterPool {
  const pool = new Map<string, number>();
  for (const letter of letters) {
    pool.set(letter, (pool.get(letter) || 0) + 1);
  }
  return pool;
}

/**
 * Remove one copy of `letter`; null when the pool has none left
 */
export function takeLetter(pool: LetterPool, letter: string): LetterPool | null {
  const available = pool.get(letter) || 0;
  if (available === 0) {
    return null;
  }
  const next = new Map(pool);
  if (available === 1) {
    next.delete(letter);
  } else {
    next.set(letter, available - 1);
  }
  return next;
}

export function poolSize(pool: LetterPool): number {
  let total = 0;
  for (const count of pool.values()) total += count;
  return total;
}

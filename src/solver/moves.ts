/**
 * Candidate move generation for the swap search.
 *
 * Only pairs of currently mismatched cells are proposed. Swapping a
 * mismatched cell with a correct one can never lower the distance, so
 * the branching factor is O(k²) over the k mismatches instead of O(n²)
 * over every cell.
 */

import { diffBoards } from '../model/board';
import { Board, compareSwaps, makeSwap, MoveSet, Swap, swapKey } from '../model/types';

export function generateMoves(current: Board, target: Board): MoveSet {
  const mismatches = diffBoards(current, target);

  if (mismatches.length === 0) {
    return { mismatches, moves: [], diagnostic: 'solved' };
  }

  // A lone differing cell means the letter multisets differ
  if (mismatches.length === 1) {
    return { mismatches, moves: [], diagnostic: 'single_mismatch' };
  }

  const seen = new Set<string>();
  const moves: Swap[] = [];
  for (let i = 0; i < mismatches.length; i++) {
    for (let j = i + 1; j < mismatches.length; j++) {
      const swap = makeSwap(mismatches[i], mismatches[j]);
      const key = swapKey(swap);
      if (seen.has(key)) continue;
      seen.add(key);
      moves.push(swap);
    }
  }

  // Sorted so that downstream tie-breaking is deterministic
  moves.sort(compareSwaps);
  return { mismatches, moves, diagnostic: null };
}

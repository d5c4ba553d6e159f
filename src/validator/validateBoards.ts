/**
 * Validate board pairs and swap paths
 */

import { applySwap, boardsEqual, isInBounds, letterCounts } from '../model/board';
import { Board, compareCells, formatCell, Swap, ValidationResult } from '../model/types';

/**
 * Check that two boards can be compared by the swap search
 */
export function validateBoardPair(from: Board, to: Board): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (from.rows !== to.rows || from.cols !== to.cols) {
    errors.push(`Size mismatch: ${from.rows}x${from.cols} vs ${to.rows}x${to.cols}`);
    return { valid: false, errors, warnings };
  }

  if (!sameLetters(from, to)) {
    warnings.push('Boards do not contain the same letters; no swap path exists');
  } else if (boardsEqual(from, to)) {
    warnings.push('Boards are already identical');
  }

  return { valid: errors.length === 0, errors, warnings };
}

/**
 * Check that replaying `path` on `from` produces `to`
 */
export function validateSwapPath(from: Board, to: Board, path: readonly Swap[]): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const pair = validateBoardPair(from, to);
  if (!pair.valid) {
    return pair;
  }

  let current = from;
  for (let i = 0; i < path.length; i++) {
    const swap = path[i];

    if (!isInBounds(current, swap.a) || !isInBounds(current, swap.b)) {
      errors.push(`Step ${i + 1}: swap ${formatCell(swap.a)}-${formatCell(swap.b)} is out of bounds`);
      return { valid: false, errors, warnings };
    }

    const order = compareCells(swap.a, swap.b);
    if (order > 0) {
      errors.push(`Step ${i + 1}: swap ${formatCell(swap.a)}-${formatCell(swap.b)} is not canonical`);
    } else if (order === 0) {
      warnings.push(`Step ${i + 1}: swap exchanges ${formatCell(swap.a)} with itself`);
    }

    current = applySwap(current, swap);
  }

  if (!boardsEqual(current, to)) {
    errors.push(`Path of ${path.length} swap(s) does not reach the target board`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

function sameLetters(a: Board, b: Board): boolean {
  const countsA = letterCounts(a);
  const countsB = letterCounts(b);
  if (countsA.size !== countsB.size) return false;
  for (const [letter, count] of countsA) {
    if (countsB.get(letter) !== count) return false;
  }
  return true;
}

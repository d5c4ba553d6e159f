/**
 * Step-by-step replay of a swap path for display
 */

import { applySwap, boardLines, getCell } from '../model/board';
import { Board, formatCell, PathStep, Swap } from '../model/types';

/**
 * Apply the swaps in order, recording the letters exchanged at each step
 * and the board that results from it.
 */
export function replaySwaps(start: Board, path: readonly Swap[]): PathStep[] {
  const steps: PathStep[] = [];
  let current = start;
  path.forEach((swap, index) => {
    const letterA = getCell(current, swap.a);
    const letterB = getCell(current, swap.b);
    current = applySwap(current, swap);
    steps.push({ index, swap, letterA, letterB, board: current });
  });
  return steps;
}

export function formatSwapStep(step: PathStep): string {
  return `- swap '${step.letterA}' at ${formatCell(step.swap.a)} with '${step.letterB}' at ${formatCell(step.swap.b)}`;
}

/**
 * Start grid, then each swap line followed by the grid it produces.
 * The last grid printed is the target.
 */
export function formatTransformation(start: Board, path: readonly Swap[]): string[] {
  const lines = boardLines(start);
  for (const step of replaySwaps(start, path)) {
    lines.push(formatSwapStep(step), ...boardLines(step.board));
  }
  return lines;
}

/**
 * Generate human-readable explanations for swap search results
 */

import { letterCounts } from '../model/board';
import { Board, Conflict, Explanation, SwapSearchResult } from '../model/types';

export function explainSearchResult(from: Board, to: Board, result: SwapSearchResult): Explanation {
  const { stats } = result;

  if (result.status === 'solved') {
    const swaps = result.path.length;
    return {
      type: 'success',
      message: swaps === 0 ? 'Boards are already identical' : `Found a path of ${swaps} swap(s)`,
      details: [`Expanded ${stats.expanded} board(s) in ${stats.timeMs}ms`],
    };
  }

  const conflicts: Conflict[] = [];

  if (result.status === 'incomplete') {
    conflicts.push({
      type: 'budget_exhausted',
      description: `Search stopped after expanding ${stats.expanded} board(s)`,
    });
    return {
      type: 'incomplete',
      message: 'Search budget exhausted before a path was found',
      details: formatDetails(conflicts),
      conflicts,
    };
  }

  // Letters present on one board and not the other make the target unreachable
  conflicts.push(...findLetterConflicts(from, to));

  if (stats.singleMismatches > 0) {
    conflicts.push({
      type: 'single_mismatch',
      description: `${stats.singleMismatches} board(s) were left with a single differing cell`,
      count: stats.singleMismatches,
    });
  }

  if (stats.depthCutoffs > 0) {
    conflicts.push({
      type: 'depth_limit',
      description: `${stats.depthCutoffs} branch(es) exceeded the depth bound`,
      count: stats.depthCutoffs,
    });
  }

  const lettersDiffer = conflicts.some(c => c.type === 'letter_surplus' || c.type === 'letter_deficit');
  let message = 'No swap path found';
  if (lettersDiffer) {
    message = 'Boards do not contain the same letters';
  } else if (stats.depthCutoffs > 0) {
    message = 'No swap path found within the depth bound';
  }

  return {
    type: 'unsat',
    message,
    details: formatDetails(conflicts),
    conflicts,
  };
}

/**
 * Letters whose counts differ between the two boards, in character order
 */
export function findLetterConflicts(from: Board, to: Board): Conflict[] {
  const fromCounts = letterCounts(from);
  const toCounts = letterCounts(to);
  const letters = [...new Set([...fromCounts.keys(), ...toCounts.keys()])].sort();

  const conflicts: Conflict[] = [];
  for (const letter of letters) {
    const delta = (fromCounts.get(letter) || 0) - (toCounts.get(letter) || 0);
    if (delta > 0) {
      conflicts.push({
        type: 'letter_surplus',
        description: `'${letter}' appears ${delta} more time(s) in the start board`,
        letter,
        count: delta,
      });
    } else if (delta < 0) {
      conflicts.push({
        type: 'letter_deficit',
        description: `'${letter}' appears ${-delta} more time(s) in the target board`,
        letter,
        count: -delta,
      });
    }
  }
  return conflicts;
}

function formatDetails(conflicts: Conflict[]): string[] {
  return conflicts.map(c => `${c.type}: ${c.description}`);
}

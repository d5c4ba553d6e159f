/**
 * Board helpers. Every function is pure: boards are never mutated, and
 * updates return a new board.
 */

import { DimensionMismatchError, OutOfBoundsError } from './errors';
import { Board, Cell, Swap } from './types';

/**
 * Build a board from its text rows. Rows are split into characters by
 * code point, so a cell always holds one visible character.
 * Callers validate raggedness first (see parseBoard); this only asserts it.
 */
export function createBoard(lines: readonly string[]): Board {
  const cells = lines.map(line => Object.freeze(Array.from(line)));
  const cols = cells.length > 0 ? cells[0].length : 0;
  if (cells.some(row => row.length !== cols)) {
    throw new Error('Expected all lines to be the same length!');
  }
  return Object.freeze({ rows: cells.length, cols, cells: Object.freeze(cells) });
}

export function isInBounds(board: Board, cell: Cell): boolean {
  return (
    Number.isInteger(cell.row) &&
    Number.isInteger(cell.col) &&
    cell.row >= 0 &&
    cell.row < board.rows &&
    cell.col >= 0 &&
    cell.col < board.cols
  );
}

export function getCell(board: Board, cell: Cell): string {
  if (!isInBounds(board, cell)) {
    throw new OutOfBoundsError(cell.row, cell.col, board);
  }
  return board.cells[cell.row][cell.col];
}

function assertSameSize(a: Board, b: Board): void {
  if (a.rows !== b.rows || a.cols !== b.cols) {
    throw new DimensionMismatchError(a, b);
  }
}

/**
 * Coordinates where the two boards disagree, in row-major order
 */
export function diffBoards(a: Board, b: Board): Cell[] {
  assertSameSize(a, b);
  const differences: Cell[] = [];
  for (let row = 0; row < a.rows; row++) {
    for (let col = 0; col < a.cols; col++) {
      if (a.cells[row][col] !== b.cells[row][col]) {
        differences.push({ row, col });
      }
    }
  }
  return differences;
}

/**
 * Hamming distance: number of cells that differ
 */
export function boardDistance(a: Board, b: Board): number {
  return diffBoards(a, b).length;
}

export function applySwap(board: Board, swap: Swap): Board {
  const first = getCell(board, swap.a);
  const second = getCell(board, swap.b);
  const lines = board.cells.map((row, r) => {
    if (r !== swap.a.row && r !== swap.b.row) {
      return row.join('');
    }
    const next = [...row];
    if (r === swap.a.row) next[swap.a.col] = second;
    if (r === swap.b.row) next[swap.b.col] = first;
    return next.join('');
  });
  return createBoard(lines);
}

export function applySwaps(board: Board, swaps: readonly Swap[]): Board {
  return swaps.reduce((current, swap) => applySwap(current, swap), board);
}

/**
 * Content key used to deduplicate boards during search
 */
export function boardKey(board: Board): string {
  return board.cells.map(row => row.join('')).join('\n');
}

export function boardsEqual(a: Board, b: Board): boolean {
  return a.rows === b.rows && a.cols === b.cols && boardKey(a) === boardKey(b);
}

export function boardLines(board: Board): string[] {
  return board.cells.map(row => row.join(''));
}

export function boardToString(board: Board): string {
  return boardLines(board).join('\n');
}

/**
 * Multiset of the characters on the board
 */
export function letterCounts(board: Board): Map<string, number> {
  const counts = new Map<string, number>();
  for (const row of board.cells) {
    for (const letter of row) {
      counts.set(letter, (counts.get(letter) || 0) + 1);
    }
  }
  return counts;
}

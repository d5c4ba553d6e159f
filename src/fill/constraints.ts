/**
 * Waffle constraint board.
 *
 * A waffle of side n has a word along every even row and every even
 * column; (odd, odd) cells are holes. Each word is a WordConstraint
 * holding the letters fixed so far, and the board carries the pool of
 * letters still unplaced.
 */

import { WAFFLE_LIMITS } from '../config/defaults';
import { splitLines } from '../model/parser';
import { Cell, FillBoard, ParseResult, Slot, WordConstraint } from '../model/types';
import { createPool, takeLetter } from './pool';

// ===== Word Constraints =====

/**
 * Build a constraint from a pattern such as "c??ne" ('?' = open)
 */
export function createConstraint(length: number, pattern = ''): WordConstraint {
  const fixed = new Map<number, string>();
  Array.from(pattern).forEach((letter, index) => {
    if (letter !== '?' && index < length) fixed.set(index, letter);
  });
  return { length, fixed };
}

export function constraintMatches(constraint: WordConstraint, word: string): boolean {
  const letters = Array.from(word);
  if (letters.length !== constraint.length) {
    return false;
  }
  for (const [index, expected] of constraint.fixed) {
    if (letters[index] !== expected) return false;
  }
  return true;
}

export function withLetter(constraint: WordConstraint, index: number, letter: string): WordConstraint {
  const fixed = new Map(constraint.fixed);
  fixed.set(index, letter);
  return { length: constraint.length, fixed };
}

export function isConstraintComplete(constraint: WordConstraint): boolean {
  return constraint.fixed.size === constraint.length;
}

// ===== Fill Board =====

const slotIndex = (line: number): number | null => (line % 2 === 0 ? line / 2 : null);

export const isHole = (row: number, col: number): boolean => row % 2 === 1 && col % 2 === 1;

export function createFillBoard(size: number, letters: Iterable<string>): FillBoard {
  const slots = Math.floor(size / 2) + 1;
  return {
    size,
    rows: Array.from({ length: slots }, () => createConstraint(size)),
    cols: Array.from({ length: slots }, () => createConstraint(size)),
    pool: createPool(letters),
  };
}

export function getLetter(board: FillBoard, row: number, col: number): string | undefined {
  const rowSlot = slotIndex(row);
  if (rowSlot !== null) {
    return board.rows[rowSlot]?.fixed.get(col);
  }
  const colSlot = slotIndex(col);
  if (colSlot !== null) {
    return board.cols[colSlot]?.fixed.get(row);
  }
  return undefined;
}

/**
 * Fix `letter` at (row, col), drawing it from the pool.
 * Returns the same board when the letter is already there, and null
 * when the cell is a hole, holds another letter, or the pool has no
 * copy of the letter left.
 */
export function placeLetter(board: FillBoard, row: number, col: number, letter: string): FillBoard | null {
  if (row < 0 || col < 0 || row >= board.size || col >= board.size || isHole(row, col)) {
    return null;
  }

  const current = getLetter(board, row, col);
  if (current === letter) {
    return board;
  }
  if (current !== undefined) {
    return null;
  }

  const pool = takeLetter(board.pool, letter);
  if (!pool) {
    return null;
  }

  const rowSlot = slotIndex(row);
  const colSlot = slotIndex(col);
  return {
    size: board.size,
    rows: board.rows.map((c, i) => (i === rowSlot ? withLetter(c, col, letter) : c)),
    cols: board.cols.map((c, i) => (i === colSlot ? withLetter(c, row, letter) : c)),
    pool,
  };
}

/**
 * Place a whole word along `cells`, one letter at a time
 */
export function placeWord(board: FillBoard, word: string, cells: readonly Cell[]): FillBoard | null {
  const letters = Array.from(word);
  if (letters.length !== cells.length) {
    return null;
  }

  let current: FillBoard | null = board;
  for (let cursor = 0; cursor < cells.length && current; cursor++) {
    current = placeLetter(current, cells[cursor].row, cells[cursor].col, letters[cursor]);
  }
  return current;
}

/**
 * Slots that still have open cells: rows first, then columns
 */
export function openSlots(board: FillBoard): Slot[] {
  const slots: Slot[] = [];
  board.rows.forEach((constraint, index) => {
    if (isConstraintComplete(constraint)) return;
    const cells = Array.from({ length: board.size }, (_, col) => ({ row: index * 2, col }));
    slots.push({ kind: 'row', index, constraint, cells });
  });
  board.cols.forEach((constraint, index) => {
    if (isConstraintComplete(constraint)) return;
    const cells = Array.from({ length: board.size }, (_, row) => ({ row, col: index * 2 }));
    slots.push({ kind: 'col', index, constraint, cells });
  });
  return slots;
}

export function fillBoardToString(board: FillBoard): string {
  const lines: string[] = [];
  for (let row = 0; row < board.size; row++) {
    let line = '';
    for (let col = 0; col < board.size; col++) {
      line += getLetter(board, row, col) ?? ' ';
    }
    lines.push(line);
  }
  return lines.join('\n');
}

// ===== Parsing =====

const LETTER = /^[a-z0-9]$/i;

const isFixed = (ch: string): boolean => ch !== ch.toLowerCase() && ch === ch.toUpperCase();

/**
 * Parse a waffle board file. Uppercase letters are fixed in place;
 * lowercase letters are available but not yet placed. Hole cells may
 * hold any character.
 */
export function parseFillBoard(text: string): ParseResult<FillBoard> {
  const lines = splitLines(text).map(line => Array.from(line));

  if (lines.length === 0) {
    return { success: false, error: 'Expected at least one line!' };
  }

  const size = lines[0].length;
  if (lines.some(line => line.length !== size)) {
    return { success: false, error: 'Expected all lines to be the same length!' };
  }
  if (lines.length !== size) {
    return { success: false, error: `Waffle board must be square, got ${lines.length}x${size}` };
  }
  if (size < WAFFLE_LIMITS.minSize || size % 2 === 0) {
    return { success: false, error: `Waffle board side must be odd and at least ${WAFFLE_LIMITS.minSize}, got ${size}` };
  }

  const letters: string[] = [];
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      if (isHole(row, col)) continue;
      const ch = lines[row][col];
      if (!LETTER.test(ch)) {
        return { success: false, error: `Cell (${row},${col}) must hold a letter, got '${ch}'` };
      }
      letters.push(ch.toLowerCase());
    }
  }

  let board: FillBoard | null = createFillBoard(size, letters);
  for (let row = 0; row < size && board; row++) {
    for (let col = 0; col < size && board; col++) {
      const ch = lines[row][col];
      if (isHole(row, col) || !isFixed(ch)) continue;
      board = placeLetter(board, row, col, ch.toLowerCase());
    }
  }

  if (!board) {
    return { success: false, error: 'Invalid board: fixed letters are inconsistent' };
  }
  return { success: true, data: board };
}

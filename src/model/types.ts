/**
 * Core type definitions for the Waffle solvers
 */

// ===== Grid Types =====

export interface Cell {
  row: number;
  col: number;
}

/**
 * Immutable snapshot of a character grid.
 * cells[r][c] is a single character; every row has `cols` entries.
 */
export interface Board {
  readonly rows: number;
  readonly cols: number;
  readonly cells: ReadonlyArray<ReadonlyArray<string>>;
}

// ===== Swap Types =====

/**
 * Unordered pair of cells. Always stored with `a` before `b` in
 * row-major order; build one with `makeSwap`.
 */
export interface Swap {
  readonly a: Cell;
  readonly b: Cell;
}

// ===== Move Generation Types =====

/**
 * - 'solved': current board already equals the target
 * - 'single_mismatch': exactly one cell differs, which no swap can fix
 */
export type MoveDiagnostic = 'solved' | 'single_mismatch' | null;

export interface MoveSet {
  mismatches: Cell[];
  moves: Swap[];
  diagnostic: MoveDiagnostic;
}

// ===== Search Types =====

export interface SearchConfig {
  maxDepth: number; // Longest path explored before a branch is abandoned
  maxExpansions: number; // Boards expanded before giving up (Infinity = no budget)
  debugLevel: 0 | 1 | 2; // 0=off, 1=basic, 2=verbose
}

export interface SearchStats {
  expanded: number;
  generated: number;
  pruned: number; // Non-improving swaps skipped
  duplicates: number; // Paths no shorter than a known one
  depthCutoffs: number;
  singleMismatches: number;
  timeMs: number;
}

/** Reported for every child board pushed onto the frontier */
export interface SearchStep {
  parent: Board;
  child: Board;
  swap: Swap;
  parentDistance: number;
  childDistance: number;
  depth: number;
}

export type SearchStatus = 'solved' | 'unsolvable' | 'incomplete';

export type SwapSearchResult =
  | { status: 'solved'; path: Swap[]; stats: SearchStats }
  | { status: Exclude<SearchStatus, 'solved'>; path: null; stats: SearchStats };

// ===== Path Player Types =====

export interface PathStep {
  index: number;
  swap: Swap;
  /** Letter found at swap.a before the step */
  letterA: string;
  /** Letter found at swap.b before the step */
  letterB: string;
  /** Board after the step */
  board: Board;
}

// ===== Validation Types =====

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ===== Explanation Types =====

export interface Explanation {
  type: 'success' | 'unsat' | 'incomplete';
  message: string;
  details: string[];
  conflicts?: Conflict[];
}

export interface Conflict {
  type: 'letter_surplus' | 'letter_deficit' | 'depth_limit' | 'single_mismatch' | 'budget_exhausted';
  description: string;
  letter?: string;
  count?: number;
}

// ===== Parsing Types =====

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export interface SwapPuzzle {
  id: string;
  name: string;
  from: Board;
  to: Board;
}

// ===== Word Fill Types =====

/** Multiset of letters; never mutated, every update returns a new pool */
export type LetterPool = ReadonlyMap<string, number>;

export interface WordConstraint {
  length: number;
  /** index-in-word -> fixed letter */
  fixed: ReadonlyMap<number, string>;
}

/**
 * Waffle constraint board. Words run along every even row and every
 * even column; cells at (odd, odd) are holes.
 */
export interface FillBoard {
  size: number;
  rows: ReadonlyArray<WordConstraint>;
  cols: ReadonlyArray<WordConstraint>;
  pool: LetterPool;
}

export interface Slot {
  kind: 'row' | 'col';
  index: number; // Slot number (grid row/col = index * 2)
  constraint: WordConstraint;
  cells: Cell[];
}

export interface FillConfig {
  findAll: boolean;
  maxSolutions: number;
  debugLevel: 0 | 1 | 2;
}

export interface FillStats {
  nodes: number;
  backtracks: number;
  prunes: number;
  timeMs: number;
}

export interface FillResult {
  success: boolean;
  solutions: FillBoard[];
  stats: FillStats;
}

// ===== Utility Types =====

export const cellKey = (cell: Cell): string => `${cell.row},${cell.col}`;

export const compareCells = (c1: Cell, c2: Cell): number => {
  return c1.row !== c2.row ? c1.row - c2.row : c1.col - c2.col;
};

export const formatCell = (cell: Cell): string => `(${cell.row},${cell.col})`;

export const makeSwap = (c1: Cell, c2: Cell): Swap => {
  const [a, b] = compareCells(c1, c2) <= 0 ? [c1, c2] : [c2, c1];
  return { a: { row: a.row, col: a.col }, b: { row: b.row, col: b.col } };
};

export const swapKey = (swap: Swap): string => `${cellKey(swap.a)}-${cellKey(swap.b)}`;

export const compareSwaps = (s1: Swap, s2: Swap): number => {
  return compareCells(s1.a, s2.a) || compareCells(s1.b, s2.b);
};

/**
 * Lexicographic order over swap sequences; a proper prefix sorts first.
 */
export const comparePaths = (p1: readonly Swap[], p2: readonly Swap[]): number => {
  const shared = Math.min(p1.length, p2.length);
  for (let i = 0; i < shared; i++) {
    const order = compareSwaps(p1[i], p2[i]);
    if (order !== 0) return order;
  }
  return p1.length - p2.length;
};

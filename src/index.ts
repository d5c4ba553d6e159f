/**
 * Waffle solvers: minimum-swap search and word fill
 */

export * from './model/types';
export * from './model/errors';
export {
  applySwap,
  applySwaps,
  boardDistance,
  boardKey,
  boardLines,
  boardsEqual,
  boardToString,
  createBoard,
  diffBoards,
  getCell,
  isInBounds,
  letterCounts,
} from './model/board';
export { parseBoard, parseSwapPuzzle, swapPuzzleToYAML, splitLines } from './model/parser';
export { SwapPuzzleSchema } from './model/schemas';
export { createFillConfig, createSearchConfig, DEFAULT_FILL_CONFIG, DEFAULT_SEARCH_CONFIG } from './config/defaults';
export { generateMoves } from './solver/moves';
export { findSwapPath, findSwaps } from './solver/search';
export type { SearchHooks } from './solver/search';
export { formatSwapStep, formatTransformation, replaySwaps } from './solver/player';
export { explainSearchResult } from './solver/explain';
export { validateBoardPair, validateSwapPath } from './validator/validateBoards';
export {
  createConstraint,
  constraintMatches,
  fillBoardToString,
  getLetter,
  openSlots,
  parseFillBoard,
  placeLetter,
  placeWord,
} from './fill/constraints';
export { solveFill } from './fill/solver';
export { loadBoard, loadFillBoard, loadWordlist } from './storage/files';
export { SAMPLE_PUZZLES } from './samples';

/**
 * Word fill solver: backtracking over waffle slots.
 *
 * Board states are immutable, so backtracking needs no undo step: each
 * branch works on the board returned by placeWord and simply drops it.
 */

import { createFillConfig } from '../config/defaults';
import { FillBoard, FillConfig, FillResult, FillStats } from '../model/types';
import { createLogger, Logger } from '../utils/logger';
import { placeWord } from './constraints';
import { normalizeWordlist, selectNextSlot } from './heuristics';
import { poolSize } from './pool';

interface SearchContext {
  words: string[];
  config: FillConfig;
  stats: FillStats;
  solutions: FillBoard[];
  log: Logger;
}

/**
 * Find every way to complete the board with words from the list
 * (or only the first when `findAll` is false).
 */
export function solveFill(board: FillBoard, wordlist: Iterable<string>, overrides: Partial<FillConfig> = {}): FillResult {
  const config = createFillConfig(overrides);
  const startTime = Date.now();
  const context: SearchContext = {
    words: normalizeWordlist(wordlist),
    config,
    stats: { nodes: 0, backtracks: 0, prunes: 0, timeMs: 0 },
    solutions: [],
    log: createLogger('FILL', config.debugLevel),
  };

  context.log.info(`${context.words.length} word(s), ${poolSize(board.pool)} letter(s) to place`);
  backtrack(board, context);

  context.stats.timeMs = Date.now() - startTime;
  context.log.info(`Found ${context.solutions.length} solution(s) in ${context.stats.timeMs}ms`);

  return {
    success: context.solutions.length > 0,
    solutions: context.solutions,
    stats: context.stats,
  };
}

/**
 * Returns true once enough solutions have been collected
 */
function backtrack(board: FillBoard, context: SearchContext): boolean {
  const { config, stats, solutions, log } = context;
  stats.nodes++;

  const choice = selectNextSlot(board, context.words);
  if (!choice) {
    solutions.push(board);
    log.info(`Found solution ${solutions.length}`);
    return !config.findAll || solutions.length >= config.maxSolutions;
  }

  const { slot, candidates } = choice;
  if (candidates.length === 0) {
    stats.prunes++;
    log.debug(`No candidates for ${slot.kind} ${slot.index * 2}`);
    return false;
  }

  for (const word of candidates) {
    const next = placeWord(board, word, slot.cells);
    if (!next) {
      stats.prunes++;
      log.debug(`Pruned '${word}' at ${slot.kind} ${slot.index * 2}: letters unavailable`);
      continue;
    }

    if (backtrack(next, context)) {
      return true;
    }
    stats.backtracks++;
  }

  return false;
}

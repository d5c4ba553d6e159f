#!/usr/bin/env node
/**
 * waffle-swaps <from-board> <to-board>
 *
 * Prints the start board and the shortest list of swaps that turns it
 * into the target board.
 */

import { Board } from '../model/types';
import { explainSearchResult } from '../solver/explain';
import { findSwaps } from '../solver/search';
import { formatTransformation } from '../solver/player';
import { loadBoard } from '../storage/files';
import { validateBoardPair } from '../validator/validateBoards';
import { checkArgCount, CliIO, consoleIO, reportInputError, runMain } from './io';

export const SWAPS_USAGE = 'Usage: waffle-swaps <from-board> <to-board>';

export async function runSwapsCli(args: readonly string[], io: CliIO = consoleIO): Promise<number> {
  if (!checkArgCount(args, 2, SWAPS_USAGE, io)) {
    return 1;
  }

  let from: Board;
  let to: Board;
  try {
    from = await loadBoard(args[0]);
    to = await loadBoard(args[1]);
  } catch (error) {
    return reportInputError(error, io);
  }

  const pair = validateBoardPair(from, to);
  if (!pair.valid) {
    pair.errors.forEach(message => io.stderr(message));
    return 1;
  }

  const result = findSwaps(from, to);
  if (result.path === null) {
    io.stdout('Could not find a path.');
    if (result.stats.depthCutoffs > 0) {
      io.stderr(explainSearchResult(from, to, result).message);
    }
    return 0;
  }

  formatTransformation(from, result.path).forEach(line => io.stdout(line));
  return 0;
}

if (require.main === module) {
  runMain(runSwapsCli);
}

#!/usr/bin/env node
/**
 * waffle-fill <wordlist> <waffle-board>
 *
 * Prints every way to fill the waffle with words from the list, each
 * followed by a blank line.
 */

import { fillBoardToString } from '../fill/constraints';
import { solveFill } from '../fill/solver';
import { FillBoard } from '../model/types';
import { loadFillBoard, loadWordlist } from '../storage/files';
import { checkArgCount, CliIO, consoleIO, reportInputError, runMain } from './io';

export const FILL_USAGE = 'Usage: waffle-fill <wordlist> <waffle-board>';

export async function runFillCli(args: readonly string[], io: CliIO = consoleIO): Promise<number> {
  if (!checkArgCount(args, 2, FILL_USAGE, io)) {
    return 1;
  }

  let words: string[];
  let board: FillBoard;
  try {
    words = await loadWordlist(args[0]);
    board = await loadFillBoard(args[1]);
  } catch (error) {
    return reportInputError(error, io);
  }

  const result = solveFill(board, words);
  if (!result.success) {
    io.stdout('No solutions found.');
    return 0;
  }

  for (const solution of result.solutions) {
    io.stdout(fillBoardToString(solution));
    io.stdout('');
  }
  return 0;
}

if (require.main === module) {
  runMain(runFillCli);
}

/**
 * Board and wordlist loading from disk
 */

import { readFile } from 'fs/promises';
import { parseFillBoard } from '../fill/constraints';
import { BoardParseError, InputFileError } from '../model/errors';
import { parseBoard, splitLines } from '../model/parser';
import { Board, FillBoard } from '../model/types';

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFileError(path, reason);
  }
}

/**
 * Load a swap board; throws BoardParseError on malformed grids
 */
export async function loadBoard(path: string): Promise<Board> {
  const result = parseBoard(await readText(path));
  if (!result.success) {
    throw new BoardParseError(result.error, path);
  }
  return result.data;
}

export async function loadFillBoard(path: string): Promise<FillBoard> {
  const result = parseFillBoard(await readText(path));
  if (!result.success) {
    throw new BoardParseError(result.error, path);
  }
  return result.data;
}

/**
 * One word per line; surrounding whitespace is ignored
 */
export async function loadWordlist(path: string): Promise<string[]> {
  return splitLines(await readText(path))
    .map(line => line.trim())
    .filter(line => line.length > 0);
}

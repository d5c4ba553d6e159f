/**
 * Parsers for text grids and YAML/JSON swap puzzle documents
 */

import YAML from 'yaml';
import { boardLines, createBoard } from './board';
import { formatZodIssues, GridSchemaType, SwapPuzzleSchema } from './schemas';
import { Board, ParseResult, SwapPuzzle } from './types';

/**
 * Split file text into rows. A single trailing newline does not start a
 * new row, and CRLF endings are accepted.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Parse a text grid: one character per cell, one row per line
 */
export function parseBoard(text: string): ParseResult<Board> {
  const lines = splitLines(text);

  if (lines.length === 0) {
    return { success: false, error: 'Expected at least one line!' };
  }

  const width = Array.from(lines[0]).length;
  if (width === 0) {
    return { success: false, error: 'Expected the first line to contain at least one cell' };
  }

  for (let r = 1; r < lines.length; r++) {
    const length = Array.from(lines[r]).length;
    if (length !== width) {
      return {
        success: false,
        error: `Expected all lines to be the same length! Line ${r + 1} has ${length} cells, expected ${width}`,
      };
    }
  }

  return { success: true, data: createBoard(lines) };
}

function gridToText(grid: GridSchemaType): string {
  return typeof grid === 'string' ? grid : grid.join('\n');
}

/**
 * Parse a YAML or JSON swap puzzle:
 *
 *   id: sample
 *   name: Two rows
 *   from: [ab, cd]
 *   to: |
 *     ba
 *     cd
 */
export function parseSwapPuzzle(input: string): ParseResult<SwapPuzzle> {
  try {
    // Try parsing as JSON first
    let data: unknown;
    try {
      data = JSON.parse(input);
    } catch {
      // If JSON fails, try YAML
      data = YAML.parse(input);
    }

    if (data === null || data === undefined) {
      return { success: false, error: 'Empty puzzle document' };
    }

    const validated = SwapPuzzleSchema.safeParse(data);
    if (!validated.success) {
      return { success: false, error: `Validation failed: ${formatZodIssues(validated.error)}` };
    }

    const from = parseBoard(gridToText(validated.data.from));
    if (!from.success) {
      return { success: false, error: `from: ${from.error}` };
    }
    const to = parseBoard(gridToText(validated.data.to));
    if (!to.success) {
      return { success: false, error: `to: ${to.error}` };
    }

    if (from.data.rows !== to.data.rows || from.data.cols !== to.data.cols) {
      return {
        success: false,
        error: `Size mismatch: ${from.data.rows}x${from.data.cols} vs ${to.data.rows}x${to.data.cols}`,
      };
    }

    return {
      success: true,
      data: {
        id: validated.data.id || generateId(),
        name: validated.data.name || 'Untitled Puzzle',
        from: from.data,
        to: to.data,
      },
    };
  } catch (error) {
    return {
      success: false,
      error: `Parse error: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Convert a SwapPuzzle to a YAML string
 */
export function swapPuzzleToYAML(puzzle: SwapPuzzle): string {
  return YAML.stringify({
    id: puzzle.id,
    name: puzzle.name,
    from: boardLines(puzzle.from),
    to: boardLines(puzzle.to),
  });
}

function generateId(): string {
  return `puzzle_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

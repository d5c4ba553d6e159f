/**
 * Tests for search result explanations
 */

import { createBoard } from '../../model/board';
import { parseSwapPuzzle } from '../../model/parser';
import { SAMPLE_PUZZLES } from '../../samples';
import { explainSearchResult, findLetterConflicts } from '../explain';
import { findSwaps } from '../search';

describe('explainSearchResult', () => {
  it('should describe a solved search', () => {
    const from = createBoard(['ab', 'cd']);
    const to = createBoard(['cd', 'ab']);
    const explanation = explainSearchResult(from, to, findSwaps(from, to));
    expect(explanation.type).toBe('success');
    expect(explanation.message).toBe('Found a path of 2 swap(s)');
    expect(explanation.details[0]).toMatch(/^Expanded \d+ board\(s\) in \d+ms$/);
  });

  it('should describe identical boards', () => {
    const board = createBoard(['ab']);
    expect(explainSearchResult(board, board, findSwaps(board, board)).message).toBe('Boards are already identical');
  });

  it('should list letter conflicts before the single mismatch dead end', () => {
    const from = createBoard(['ab', 'cd']);
    const to = createBoard(['ab', 'ce']);
    const explanation = explainSearchResult(from, to, findSwaps(from, to));

    expect(explanation.type).toBe('unsat');
    expect(explanation.message).toBe('Boards do not contain the same letters');
    expect(explanation.details).toEqual([
      "letter_surplus: 'd' appears 1 more time(s) in the start board",
      "letter_deficit: 'e' appears 1 more time(s) in the target board",
      'single_mismatch: 1 board(s) were left with a single differing cell',
    ]);
  });

  it('should blame the depth bound when letters agree', () => {
    const sample = SAMPLE_PUZZLES.find(p => p.id === 'sample_waffle');
    if (!sample) throw new Error('Missing sample');
    const parsed = parseSwapPuzzle(sample.yaml);
    if (!parsed.success) throw new Error(parsed.error);

    const { from, to } = parsed.data;
    const explanation = explainSearchResult(from, to, findSwaps(from, to, { maxDepth: 2 }));
    expect(explanation.type).toBe('unsat');
    expect(explanation.message).toBe('No swap path found within the depth bound');
    expect(explanation.conflicts?.map(c => c.type)).toEqual(['depth_limit']);
  });

  it('should report an exhausted budget', () => {
    const from = createBoard(['ab', 'cd']);
    const to = createBoard(['cd', 'ab']);
    const explanation = explainSearchResult(from, to, findSwaps(from, to, { maxExpansions: 1 }));
    expect(explanation.type).toBe('incomplete');
    expect(explanation.message).toBe('Search budget exhausted before a path was found');
    expect(explanation.details).toEqual(['budget_exhausted: Search stopped after expanding 1 board(s)']);
  });
});

describe('findLetterConflicts', () => {
  it('should return nothing for boards with the same letters', () => {
    expect(findLetterConflicts(createBoard(['abc']), createBoard(['cab']))).toEqual([]);
  });

  it('should count surplus and deficit per letter', () => {
    const conflicts = findLetterConflicts(createBoard(['aab']), createBoard(['bbc']));
    expect(conflicts).toEqual([
      { type: 'letter_surplus', description: "'a' appears 2 more time(s) in the start board", letter: 'a', count: 2 },
      { type: 'letter_deficit', description: "'b' appears 1 more time(s) in the target board", letter: 'b', count: 1 },
      { type: 'letter_deficit', description: "'c' appears 1 more time(s) in the target board", letter: 'c', count: 1 },
    ]);
  });
});

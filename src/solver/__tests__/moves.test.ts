/**
 * Tests for candidate move generation
 */

import { createBoard } from '../../model/board';
import { swapKey } from '../../model/types';
import { generateMoves } from '../moves';

describe('generateMoves', () => {
  it('should propose nothing when the boards are equal', () => {
    const board = createBoard(['ab', 'cd']);
    expect(generateMoves(board, board)).toEqual({ mismatches: [], moves: [], diagnostic: 'solved' });
  });

  it('should flag a single differing cell instead of returning silently', () => {
    const result = generateMoves(createBoard(['ab', 'cd']), createBoard(['ab', 'ce']));
    expect(result.diagnostic).toBe('single_mismatch');
    expect(result.moves).toEqual([]);
    expect(result.mismatches).toEqual([{ row: 1, col: 1 }]);
  });

  it('should pair every two mismatched cells in sorted order', () => {
    const result = generateMoves(createBoard(['abc', 'xyz']), createBoard(['bca', 'xyz']));
    expect(result.diagnostic).toBeNull();
    expect(result.moves.map(swapKey)).toEqual(['0,0-0,1', '0,0-0,2', '0,1-0,2']);
  });

  it('should never touch cells that already match', () => {
    const result = generateMoves(createBoard(['ab', 'cd']), createBoard(['ba', 'cd']));
    expect(result.moves).toEqual([{ a: { row: 0, col: 0 }, b: { row: 0, col: 1 } }]);
  });

  it('should produce k*(k-1)/2 distinct swaps for k mismatches', () => {
    const result = generateMoves(createBoard(['abcd', 'efgh']), createBoard(['badc', 'fehg']));
    const keys = result.moves.map(swapKey);
    expect(result.mismatches).toHaveLength(8);
    expect(keys).toHaveLength(28);
    expect(new Set(keys).size).toBe(28);
  });
});

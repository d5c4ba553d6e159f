import { boardLines, createBoard } from '../../model/board';
import { makeSwap } from '../../model/types';
import { formatSwapStep, formatTransformation, replaySwaps } from '../player';

describe('replaySwaps', () => {
  it('should record the letters exchanged and the board after each step', () => {
    const start = createBoard(['ab', 'cd']);
    const steps = replaySwaps(start, [
      makeSwap({ row: 0, col: 0 }, { row: 1, col: 0 }),
      makeSwap({ row: 0, col: 1 }, { row: 1, col: 1 }),
    ]);

    expect(steps).toHaveLength(2);
    expect(steps[0].index).toBe(0);
    expect(steps[0].letterA).toBe('a');
    expect(steps[0].letterB).toBe('c');
    expect(boardLines(steps[0].board)).toEqual(['cb', 'ad']);
    expect(steps[1].letterA).toBe('b');
    expect(steps[1].letterB).toBe('d');
    expect(boardLines(steps[1].board)).toEqual(['cd', 'ab']);
  });

  it('should read letters from the board as it stands before each swap', () => {
    const steps = replaySwaps(createBoard(['abc']), [
      makeSwap({ row: 0, col: 0 }, { row: 0, col: 1 }),
      makeSwap({ row: 0, col: 1 }, { row: 0, col: 2 }),
    ]);
    expect(steps[1].letterA).toBe('a');
    expect(steps[1].letterB).toBe('c');
    expect(boardLines(steps[1].board)).toEqual(['bca']);
  });

  it('should return no steps for an empty path', () => {
    expect(replaySwaps(createBoard(['ab']), [])).toEqual([]);
  });
});

describe('formatTransformation', () => {
  it('should print the board after every swap, ending with the target', () => {
    const start = createBoard(['ab', 'cd']);
    const lines = formatTransformation(start, [
      makeSwap({ row: 0, col: 0 }, { row: 1, col: 0 }),
      makeSwap({ row: 0, col: 1 }, { row: 1, col: 1 }),
    ]);
    expect(lines).toEqual([
      'ab',
      'cd',
      "- swap 'a' at (0,0) with 'c' at (1,0)",
      'cb',
      'ad',
      "- swap 'b' at (0,1) with 'd' at (1,1)",
      'cd',
      'ab',
    ]);
  });

  it('should print only the start board for an empty path', () => {
    expect(formatTransformation(createBoard(['ab', 'cd']), [])).toEqual(['ab', 'cd']);
  });

  it('should format a single step', () => {
    const [step] = replaySwaps(createBoard(['xy']), [makeSwap({ row: 0, col: 1 }, { row: 0, col: 0 })]);
    expect(formatSwapStep(step)).toBe("- swap 'x' at (0,0) with 'y' at (0,1)");
  });
});

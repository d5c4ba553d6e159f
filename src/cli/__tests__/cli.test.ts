/**
 * Tests for the waffle-swaps and waffle-fill command-line tools
 */

import path from 'path';
import { CliIO } from '../io';
import { FILL_USAGE, runFillCli } from '../fill';
import { runSwapsCli, SWAPS_USAGE } from '../swaps';

const fixture = (name: string): string => path.join(__dirname, 'fixtures', name);

function captureIO(): CliIO & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: line => out.push(line),
    stderr: line => err.push(line),
  };
}

describe('waffle-swaps', () => {
  it('should print each swap followed by the board it produces', async () => {
    const io = captureIO();
    const code = await runSwapsCli([fixture('from.txt'), fixture('to.txt')], io);
    expect(code).toBe(0);
    expect(io.out).toEqual([
      'ab',
      'cd',
      "- swap 'a' at (0,0) with 'c' at (1,0)",
      'cb',
      'ad',
      "- swap 'b' at (0,1) with 'd' at (1,1)",
      'cd',
      'ab',
    ]);
    expect(io.err).toEqual([]);
  });

  it('should print only the board when nothing needs to move', async () => {
    const io = captureIO();
    expect(await runSwapsCli([fixture('from.txt'), fixture('from.txt')], io)).toBe(0);
    expect(io.out).toEqual(['ab', 'cd']);
  });

  it('should say so when no path exists', async () => {
    const io = captureIO();
    expect(await runSwapsCli([fixture('aa.txt'), fixture('bb.txt')], io)).toBe(0);
    expect(io.out).toEqual(['Could not find a path.']);
    expect(io.err).toEqual([]);
  });

  it('should blame the depth bound when a path needs more than ten swaps', async () => {
    const io = captureIO();
    expect(await runSwapsCli([fixture('cycle_from.txt'), fixture('cycle_to.txt')], io)).toBe(0);
    expect(io.out).toEqual(['Could not find a path.']);
    expect(io.err).toEqual(['No swap path found within the depth bound']);
  });

  it('should reject the wrong number of arguments', async () => {
    const io = captureIO();
    expect(await runSwapsCli([], io)).toBe(1);
    expect(io.err).toEqual(['Expected 2 command line arguments but got 0', SWAPS_USAGE]);
    expect(io.out).toEqual([]);
  });

  it('should reject boards of different sizes', async () => {
    const io = captureIO();
    expect(await runSwapsCli([fixture('from.txt'), fixture('wide.txt')], io)).toBe(1);
    expect(io.err).toEqual(['Size mismatch: 2x2 vs 1x3']);
  });

  it('should name the file holding a ragged board', async () => {
    const io = captureIO();
    const ragged = fixture('ragged.txt');
    expect(await runSwapsCli([ragged, fixture('to.txt')], io)).toBe(1);
    expect(io.err).toEqual([`${ragged}: Expected all lines to be the same length! Line 2 has 1 cells, expected 2`]);
  });

  it('should report a file that cannot be read', async () => {
    const io = captureIO();
    const missing = fixture('missing.txt');
    expect(await runSwapsCli([missing, fixture('to.txt')], io)).toBe(1);
    expect(io.err).toHaveLength(1);
    expect(io.err[0].startsWith(`Could not read ${missing}: `)).toBe(true);
  });
});

describe('waffle-fill', () => {
  it('should print each solution followed by a blank line', async () => {
    const io = captureIO();
    expect(await runFillCli([fixture('words.txt'), fixture('waffle.txt')], io)).toBe(0);
    expect(io.out).toEqual(['crane\nh f a\namong\ns o e\nenter', '']);
  });

  it('should print every solution of an open board', async () => {
    const io = captureIO();
    expect(await runFillCli([fixture('words.txt'), fixture('waffle_open.txt')], io)).toBe(0);
    expect(io.out).toHaveLength(8);
    expect(io.out.filter(line => line === '')).toHaveLength(4);
  });

  it('should say so when nothing fits', async () => {
    const io = captureIO();
    expect(await runFillCli([fixture('from.txt'), fixture('waffle.txt')], io)).toBe(0);
    expect(io.out).toEqual(['No solutions found.']);
  });

  it('should reject the wrong number of arguments', async () => {
    const io = captureIO();
    expect(await runFillCli([fixture('words.txt')], io)).toBe(1);
    expect(io.err).toEqual(['Expected 2 command line arguments but got 1', FILL_USAGE]);
  });

  it('should report a board that is not square', async () => {
    const io = captureIO();
    const board = fixture('notsquare.txt');
    expect(await runFillCli([fixture('words.txt'), board], io)).toBe(1);
    expect(io.err).toEqual([`${board}: Waffle board must be square, got 2x4`]);
  });
});

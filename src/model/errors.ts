/**
 * Error types shared by the solvers and the command-line tools
 */

export type WaffleErrorCode = 'DIMENSION_MISMATCH' | 'OUT_OF_BOUNDS' | 'BOARD_PARSE' | 'INPUT_FILE';

export class WaffleError extends Error {
  constructor(public readonly code: WaffleErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class DimensionMismatchError extends WaffleError {
  constructor(
    public readonly expected: { rows: number; cols: number },
    public readonly actual: { rows: number; cols: number }
  ) {
    super(
      'DIMENSION_MISMATCH',
      `Size mismatch: ${expected.rows}x${expected.cols} vs ${actual.rows}x${actual.cols}`
    );
  }
}

export class OutOfBoundsError extends WaffleError {
  constructor(
    public readonly row: number,
    public readonly col: number,
    bounds: { rows: number; cols: number }
  ) {
    super('OUT_OF_BOUNDS', `Cell (${row},${col}) is outside a ${bounds.rows}x${bounds.cols} board`);
  }
}

export class BoardParseError extends WaffleError {
  constructor(message: string, public readonly source?: string) {
    super('BOARD_PARSE', source ? `${source}: ${message}` : message);
  }
}

export class InputFileError extends WaffleError {
  constructor(public readonly path: string, reason: string) {
    super('INPUT_FILE', `Could not read ${path}: ${reason}`);
  }
}

export function isWaffleError(error: unknown): error is WaffleError {
  return error instanceof WaffleError;
}

/**
 * Base class for errors raised by the game core.
 * These signal broken preconditions inside the program, never a bad player move.
 */
export class TicTacToeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class IllegalPlacementError extends TicTacToeError {
  constructor(readonly index: number, reason: string) {
    super(`Cannot place at index ${index}: ${reason}`);
  }
}

export class InvalidBoardError extends TicTacToeError {}

import { IllegalPlacementError, InvalidBoardError } from './errors';

export type Mark = 'X' | 'O';
export type Cell = Mark | '';

export const HUMAN_MARK: Mark = 'X';
export const COMPUTER_MARK: Mark = 'O';

export const BOARD_SIZE = 9;

export type WinLine = readonly [number, number, number];

export const WIN_LINES: readonly WinLine[] = [
  [0, 1, 2], [3, 4, 5], [6, 7, 8], // rows
  [0, 3, 6], [1, 4, 7], [2, 5, 8], // columns
  [0, 4, 8], [2, 4, 6],            // diagonals
];

function isCell(value: unknown): value is Cell {
  return value === '' || value === 'X' || value === 'O';
}

/**
 * The 3x3 grid, addressed 0-8 in row-major order.
 */
export class Board {
  private grid: Cell[];

  constructor() {
    this.grid = Array<Cell>(BOARD_SIZE).fill('');
  }

  static from(cells: readonly unknown[]): Board {
    if (cells.length !== BOARD_SIZE) {
      throw new InvalidBoardError(`A board needs ${BOARD_SIZE} cells, got ${cells.length}`);
    }
    const board = new Board();
    cells.forEach((cell, index) => {
      if (!isCell(cell)) {
        throw new InvalidBoardError(`Cell ${index} holds an unknown value: ${String(cell)}`);
      }
      board.grid[index] = cell;
    });
    return board;
  }

  static isIndex(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < BOARD_SIZE;
  }

  get(index: number): Cell {
    return this.grid[index] ?? '';
  }

  isEmpty(index: number): boolean {
    return this.grid[index] === '';
  }

  place(index: number, mark: Mark): void {
    if (!Board.isIndex(index)) {
      throw new IllegalPlacementError(index, 'index is off the board');
    }
    if (!this.isEmpty(index)) {
      throw new IllegalPlacementError(index, `cell is taken by ${this.grid[index]}`);
    }
    this.grid[index] = mark;
  }

  // Only lookahead probes clear a single cell.
  remove(index: number): void {
    if (Board.isIndex(index)) {
      this.grid[index] = '';
    }
  }

  isWinner(mark: Mark): boolean {
    return WIN_LINES.some(line => line.every(index => this.grid[index] === mark));
  }

  winningLine(): WinLine | null {
    for (const line of WIN_LINES) {
      const [a, b, c] = line;
      const first = this.grid[a];
      if (first !== '' && first === this.grid[b] && first === this.grid[c]) {
        return line;
      }
    }
    return null;
  }

  isFull(): boolean {
    return this.grid.every(cell => cell !== '');
  }

  emptyCells(): number[] {
    return this.grid.reduce<number[]>((acc, cell, index) => {
      if (cell === '') acc.push(index);
      return acc;
    }, []);
  }

  cells(): Cell[] {
    return [...this.grid];
  }

  reset(): void {
    this.grid.fill('');
  }
}

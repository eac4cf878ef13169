import { Board, Cell, COMPUTER_MARK, HUMAN_MARK, WinLine } from './board';
import { DEFAULT_STRATEGY, STRATEGIES, StrategyName } from './strategies';

export type GameStatus = 'in_progress' | 'human_won' | 'computer_won' | 'draw';

export interface GameSnapshot {
  board: Cell[];
  status: GameStatus;
  /** Strategy that played the last computer move, or the active one before any. */
  strategy: StrategyName;
  winningLine: WinLine | null;
  pendingComputerMove: boolean;
}

export type MoveScheduler = (task: () => void) => void;

export interface GameControllerOptions {
  strategy?: StrategyName;
  /** Cosmetic pause before the computer answers, used by the default scheduler. */
  computerMoveDelayMs?: number;
  /** Runs a pending computer move. Defaults to a timer of `computerMoveDelayMs`. */
  schedule?: MoveScheduler;
  onUpdate?: (snapshot: GameSnapshot) => void;
}

export const DEFAULT_COMPUTER_MOVE_DELAY_MS = 1000;

export function isTerminal(status: GameStatus): boolean {
  return status !== 'in_progress';
}

/**
 * Runs one human-vs-computer game: the human (X) always opens,
 * and each accepted human move is answered by exactly one computer (O) move.
 */
export class GameController {
  private readonly board = new Board();
  private status: GameStatus = 'in_progress';
  private strategy: StrategyName;
  private lastPlayedStrategy: StrategyName | null = null;
  private pending = false;
  // Bumped on reset so a computer move scheduled for an earlier game is dropped.
  private generation = 0;
  private readonly schedule: MoveScheduler;
  private readonly onUpdate?: (snapshot: GameSnapshot) => void;

  constructor(options: GameControllerOptions = {}) {
    this.strategy = options.strategy ?? DEFAULT_STRATEGY;
    const delay = options.computerMoveDelayMs ?? DEFAULT_COMPUTER_MOVE_DELAY_MS;
    this.schedule = options.schedule ?? (task => {
      setTimeout(task, delay);
    });
    this.onUpdate = options.onUpdate;
  }

  /**
   * Places the human mark. Returns false, changing nothing, when the move is not legal right now.
   */
  applyHumanMove(index: number): boolean {
    if (isTerminal(this.status) || this.pending) return false;
    if (!Board.isIndex(index) || !this.board.isEmpty(index)) return false;

    this.board.place(index, HUMAN_MARK);
    this.status = this.evaluateStatus();

    if (this.status !== 'in_progress') {
      this.notify();
      return true;
    }

    this.pending = true;
    this.notify();
    const generation = this.generation;
    this.schedule(() => {
      if (generation === this.generation) {
        this.applyComputerMove();
      }
    });
    return true;
  }

  /**
   * Plays the computer's answer. Does nothing unless a human move is waiting for one,
   * so the scheduled task after a direct call finds nothing to do.
   */
  applyComputerMove(): void {
    if (!this.pending) return;
    if (isTerminal(this.status)) {
      this.pending = false;
      return;
    }

    const strategy = this.strategy;
    const move = STRATEGIES[strategy](this.board);
    this.pending = false;

    if (move === null) {
      console.error(`[GameController] Strategy ${strategy} found no move on a board that is not terminal`);
      return;
    }

    this.board.place(move, COMPUTER_MARK);
    this.lastPlayedStrategy = strategy;
    this.status = this.evaluateStatus();
    this.notify();
  }

  evaluateStatus(): GameStatus {
    if (this.board.isWinner(HUMAN_MARK)) return 'human_won';
    if (this.board.isWinner(COMPUTER_MARK)) return 'computer_won';
    if (this.board.isFull()) return 'draw';
    return 'in_progress';
  }

  rematch(): void {
    this.reset();
  }

  newGame(): void {
    this.reset();
  }

  setStrategy(strategy: StrategyName): void {
    this.strategy = strategy;
  }

  getStrategy(): StrategyName {
    return this.strategy;
  }

  getStatus(): GameStatus {
    return this.status;
  }

  isComputerMovePending(): boolean {
    return this.pending;
  }

  snapshot(): GameSnapshot {
    return {
      board: this.board.cells(),
      status: this.status,
      strategy: this.lastPlayedStrategy ?? this.strategy,
      winningLine: this.board.winningLine(),
      pendingComputerMove: this.pending,
    };
  }

  private reset(): void {
    this.board.reset();
    this.status = 'in_progress';
    this.pending = false;
    this.lastPlayedStrategy = null;
    this.generation++;
    this.notify();
  }

  private notify(): void {
    this.onUpdate?.(this.snapshot());
  }
}

import { Board, COMPUTER_MARK, HUMAN_MARK, Mark } from './board';

export type StrategyName = 'exhaustive' | 'priority' | 'heuristic';

/**
 * Picks the computer's next cell, or null when no cell is empty.
 * A strategy may probe the board but must leave it as it found it.
 */
export type Strategy = (board: Board) => number | null;

export const STRATEGY_NAMES: readonly StrategyName[] = ['exhaustive', 'priority', 'heuristic'];
export const DEFAULT_STRATEGY: StrategyName = 'exhaustive';

const NATURAL_ORDER = [0, 1, 2, 3, 4, 5, 6, 7, 8];
const CENTER = 4;
const CORNERS = [0, 2, 6, 8];
const PRIORITY_ORDER = [4, 0, 2, 6, 8, 1, 3, 5, 7];

// center 4, corners 3, edges 2
const CELL_WEIGHTS = [3, 2, 3, 2, 4, 2, 3, 2, 3];

/**
 * Returns the first empty index in `scanOrder` where `mark` would complete a line.
 */
export function findImmediateWin(board: Board, mark: Mark, scanOrder: readonly number[]): number | null {
  for (const index of scanOrder) {
    if (!board.isEmpty(index)) continue;
    board.place(index, mark);
    const wins = board.isWinner(mark);
    board.remove(index);
    if (wins) return index;
  }
  return null;
}

function firstEmpty(board: Board, order: readonly number[]): number | null {
  return order.find(index => board.isEmpty(index)) ?? null;
}

function winOrBlock(board: Board, scanOrder: readonly number[]): number | null {
  return findImmediateWin(board, COMPUTER_MARK, scanOrder)
    ?? findImmediateWin(board, HUMAN_MARK, scanOrder);
}

export const exhaustiveStrategy: Strategy = board => {
  const forced = winOrBlock(board, NATURAL_ORDER);
  if (forced !== null) return forced;

  if (board.isEmpty(CENTER)) return CENTER;
  return firstEmpty(board, CORNERS) ?? firstEmpty(board, NATURAL_ORDER);
};

export const priorityStrategy: Strategy = board =>
  winOrBlock(board, PRIORITY_ORDER) ?? firstEmpty(board, PRIORITY_ORDER);

export const heuristicStrategy: Strategy = board => {
  const forced = winOrBlock(board, NATURAL_ORDER);
  if (forced !== null) return forced;

  // Strictly greater keeps the lowest index among equal weights.
  let best: number | null = null;
  for (const index of board.emptyCells()) {
    if (best === null || CELL_WEIGHTS[index] > CELL_WEIGHTS[best]) {
      best = index;
    }
  }
  return best;
};

export const STRATEGIES: Readonly<Record<StrategyName, Strategy>> = {
  exhaustive: exhaustiveStrategy,
  priority: priorityStrategy,
  heuristic: heuristicStrategy,
};

const STRATEGY_ALIASES: Readonly<Record<string, StrategyName>> = {
  exhaustive: 'exhaustive',
  bfs: 'exhaustive',
  priority: 'priority',
  dfs: 'priority',
  heuristic: 'heuristic',
  'a*': 'heuristic',
  astar: 'heuristic',
  'a star': 'heuristic',
};

/**
 * Maps user input (a canonical name or one of the old search-algorithm labels) to a strategy name.
 */
export function parseStrategyName(text: string): StrategyName | null {
  const key = text.toLowerCase().trim().replace(/[-_\s]+/g, ' ');
  return STRATEGY_ALIASES[key] ?? null;
}

import type { Cell, WinLine } from './game/board';
import type { GameSnapshot } from './game/game_controller';

const STRATEGY_LABELS = {
  exhaustive: 'Exhaustive',
  priority: 'Priority',
  heuristic: 'Heuristic',
} as const;

/**
 * Draws the grid as text for the glasses' text wall.
 * Empty cells show their 1-9 position; a winning line is shown in lower case.
 */
export function renderBoard(cells: readonly Cell[], winningLine: WinLine | null = null): string {
  let display = '';

  for (let i = 0; i < 3; i++) {
    for (let j = 0; j < 3; j++) {
      const index = i * 3 + j;
      const mark = cells[index] ?? '';
      let cell = mark || (index + 1).toString();
      if (mark && winningLine?.includes(index)) {
        cell = mark.toLowerCase();
      }
      display += ` ${cell} `;
      if (j < 2) display += '│';
    }
    if (i < 2) display += '\n───────';
    display += '\n';
  }

  return display.trimEnd();
}

export function strategyLabel(snapshot: Pick<GameSnapshot, 'strategy'>): string {
  return STRATEGY_LABELS[snapshot.strategy];
}

/**
 * Text shown once a game ends, or null while it is still going.
 */
export function renderOutcome(snapshot: GameSnapshot): string | null {
  let headline: string;
  switch (snapshot.status) {
    case 'human_won':
      headline = 'YOU WIN!';
      break;
    case 'computer_won':
      headline = 'AI WINS!';
      break;
    case 'draw':
      headline = "It's a DRAW!";
      break;
    case 'in_progress':
      return null;
  }
  return `${headline} (AI: ${strategyLabel(snapshot)})\nSay 'rematch' or 'new game'`;
}

/**
 * What stays on screen between messages: the outcome once the game is over, the board otherwise.
 */
export function restingView(snapshot: GameSnapshot): string {
  return renderOutcome(snapshot) ?? renderBoard(snapshot.board, snapshot.winningLine);
}

/**
 * Greeting for a new session, or null when a game is already under way.
 */
export function openingMessage(snapshot: GameSnapshot): string | null {
  if (snapshot.status !== 'in_progress' || snapshot.board.some(cell => cell !== '')) {
    return null;
  }
  return `You start first! AI: ${strategyLabel(snapshot)}`;
}

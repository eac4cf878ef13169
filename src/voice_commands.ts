import { parseStrategyName, StrategyName } from './game/strategies';

export type VoiceCommand =
  | { type: 'new_game' }
  | { type: 'rematch' }
  | { type: 'set_strategy'; strategy: StrategyName }
  | { type: 'move'; index: number };

const STRATEGY_PHRASE = /^(?:use|strategy|switch to|play)\s+(.+)$/;

/**
 * Turns a final transcript into a game command, or null if it names none.
 */
export function parseVoiceCommand(transcript: string): VoiceCommand | null {
  const text = transcript.toLowerCase().trim().replace(/[.!?,]+$/g, '');
  const compact = text.replace(/[^a-z0-9]/g, '');

  if (compact.includes('newgame') || compact.includes('restart')) {
    return { type: 'new_game' };
  }
  if (compact.includes('rematch')) {
    return { type: 'rematch' };
  }

  const phrase = STRATEGY_PHRASE.exec(text);
  const strategy = parseStrategyName(phrase ? phrase[1] : text);
  if (strategy) {
    return { type: 'set_strategy', strategy };
  }

  // First digit only; positions are spoken 1-9.
  const digit = text.match(/\d/);
  if (digit) {
    const position = parseInt(digit[0], 10);
    return position >= 1 ? { type: 'move', index: position - 1 } : null;
  }

  return null;
}

import { asPlayerId } from './branded.js';
import type { PlayerId } from './branded.js';
import type { GameState } from './types.js';

export const isTerminal = (state: GameState): boolean => state.phase === 'over';

/**
 * Higher score wins; equal scores go to the longer row. Anything else, or a
 * game still in progress, has no winner.
 */
export const winner = (state: GameState): PlayerId | null => {
  if (!isTerminal(state)) {
    return null;
  }
  const [first, second] = state.players;
  if (first.score !== second.score) {
    return asPlayerId(first.score > second.score ? 0 : 1);
  }
  if (first.row.length !== second.row.length) {
    return asPlayerId(first.row.length > second.row.length ? 0 : 1);
  }
  return null;
};

export const scoreDifferential = (state: GameState, player: PlayerId): number => {
  const [first, second] = state.players;
  return player === 0 ? first.score - second.score : second.score - first.score;
};

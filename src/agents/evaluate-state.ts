import { getCardDefinition, horizonOf, opponentOf, roundOf, scoreDifferential, winner } from '../kernel/index.js';
import type { GameDef, GameState, PlayerId, PlayerState } from '../kernel/index.js';

const TERMINAL_WIN_SCORE = 1_000_000;
const TERMINAL_LOSS_SCORE = -1_000_000;
export const SCORE_WEIGHT = 100;
const HAND_VALUE_WEIGHT = 10;
const EXPOSED_EXIT_WEIGHT = 20;
const HIDDEN_TRAP_VALUE = 30;
const PENDING_PAYOFF_WEIGHT = 50;
const OPEN_CENTER_VALUE = 15;

/**
 * Continuation value of one player's position: held cards, exit cards
 * waiting to be pushed, hidden traps, marked delayed payoffs and a row one
 * card short of a center.
 */
export const positionPotential = (def: GameDef, player: PlayerState): number => {
  let potential = 0;
  for (const card of player.hand) {
    potential += getCardDefinition(def.catalog, card.name).value * HAND_VALUE_WEIGHT;
  }

  const finalRound = roundOf(horizonOf(def));
  for (const card of player.row) {
    if (card.faceDown) {
      potential += HIDDEN_TRAP_VALUE;
      continue;
    }
    const definition = getCardDefinition(def.catalog, card.name);
    if (definition.category === 'exit') {
      potential += definition.value * EXPOSED_EXIT_WEIGHT;
    }
    const { markedTurn } = card.meta;
    if (markedTurn !== undefined) {
      potential += Math.max(0, finalRound - roundOf(markedTurn)) * PENDING_PAYOFF_WEIGHT;
    }
  }

  if (player.row.length === 2) {
    potential += OPEN_CENTER_VALUE;
  }
  return potential;
};

export const potentialDifferential = (def: GameDef, state: GameState, playerId: PlayerId): number => {
  const own = playerId === 0 ? state.players[0] : state.players[1];
  const other = opponentOf(playerId) === 0 ? state.players[0] : state.players[1];
  return positionPotential(def, own) - positionPotential(def, other);
};

/** Score differential weighted over the heuristic; finished games add a win or loss bonus. */
export const evaluateState = (def: GameDef, state: GameState, playerId: PlayerId): number => {
  const differential = scoreDifferential(state, playerId) * SCORE_WEIGHT;
  if (state.phase === 'over') {
    const result = winner(state);
    if (result === null) {
      return differential;
    }
    return differential + (result === playerId ? TERMINAL_WIN_SCORE : TERMINAL_LOSS_SCORE);
  }
  return differential + potentialDifferential(def, state, playerId);
};

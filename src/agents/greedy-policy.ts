import { applyDraw, getCardDefinition, legalDraws, resolveChoice, scoreDifferential } from '../kernel/index.js';
import type { DrawChoice, GameDef, GameState, PlayerId } from '../kernel/index.js';
import { potentialDifferential } from './evaluate-state.js';

export interface Outcome {
  readonly differential: number;
  readonly potential: number;
}

export const outcomeFor = (def: GameDef, state: GameState, playerId: PlayerId): Outcome => ({
  differential: scoreDifferential(state, playerId),
  potential: potentialDifferential(def, state, playerId),
});

/** Positive when `left` is strictly better: score differential first, heuristic potential second. */
export const compareOutcomes = (left: Outcome, right: Outcome): number =>
  left.differential !== right.differential ? left.differential - right.differential : left.potential - right.potential;

interface Resolution {
  readonly index: number;
  readonly resolved: GameState;
}

/**
 * Tries every offered option, resolving nested requests the same way, and
 * keeps the first option with the best outcome for the requesting player.
 */
const bestResolution = (def: GameDef, state: GameState): Resolution => {
  const { pending } = state;
  if (pending === null) {
    throw new Error('bestResolution called without a pending choice');
  }

  const chooser = pending.request.player;
  let best: (Resolution & { readonly outcome: Outcome }) | undefined;
  for (const [index, option] of pending.request.options.entries()) {
    const resolved = resolvePendingGreedily(def, resolveChoice(def, state, option));
    const outcome = outcomeFor(def, resolved, chooser);
    if (best === undefined || compareOutcomes(outcome, best.outcome) > 0) {
      best = { index, resolved, outcome };
    }
  }

  if (best === undefined) {
    throw new Error(`greedy policy found no option for ${pending.request.kind}`);
  }
  return best;
};

export const greedyOptionIndex = (def: GameDef, state: GameState): number => bestResolution(def, state).index;

export const resolvePendingGreedily = (def: GameDef, state: GameState): GameState =>
  state.pending === null ? state : bestResolution(def, state).resolved;

/** Market cards by catalog value; the deck at the mean value of its contents. Ties keep the earlier source. */
export const greedyDrawIndex = (def: GameDef, state: GameState, draws: readonly DrawChoice[]): number => {
  const deckValue =
    state.deck.length === 0
      ? 0
      : state.deck.reduce((total, card) => total + getCardDefinition(def.catalog, card.name).value, 0) / state.deck.length;

  let bestIndex = -1;
  let bestValue = Number.NEGATIVE_INFINITY;
  for (const [index, draw] of draws.entries()) {
    const card = draw.source === 'market' ? state.market[draw.marketIndex] : undefined;
    const value = card === undefined ? deckValue : getCardDefinition(def.catalog, card.name).value;
    if (value > bestValue) {
      bestValue = value;
      bestIndex = index;
    }
  }

  if (bestIndex < 0) {
    throw new Error('greedyDrawIndex called with empty draws');
  }
  return bestIndex;
};

/** Finishes the current turn: outstanding choices, then the draw and its choices, all by the greedy policy. */
export const completeTurnGreedily = (def: GameDef, state: GameState): GameState => {
  let current = resolvePendingGreedily(def, state);
  while (current.phase === 'draw') {
    const draws = legalDraws(current);
    const draw = draws[greedyDrawIndex(def, current, draws)];
    if (draw === undefined) {
      throw new Error('completeTurnGreedily found no legal draw');
    }
    current = resolvePendingGreedily(def, applyDraw(def, current, draw));
  }
  return current;
};

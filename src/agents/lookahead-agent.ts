import { applyAction, legalPlays } from '../kernel/index.js';
import type { Agent, GameDef, GameState, PlayAction, PlayerId } from '../kernel/index.js';
import { evaluateState } from './evaluate-state.js';
import { completeTurnGreedily, greedyDrawIndex, greedyOptionIndex } from './greedy-policy.js';

export interface LookaheadAgentConfig {
  readonly depth?: number;
}

export const DEFAULT_LOOKAHEAD_DEPTH = 2;
export const MAX_LOOKAHEAD_DEPTH = 6;

/** Plays one full turn: the action, its sub-choices and the draw, all owned decisions answered greedily. */
const simulateTurn = (def: GameDef, state: GameState, action: PlayAction): GameState =>
  completeTurnGreedily(def, applyAction(def, state, action));

const minimax = (def: GameDef, state: GameState, rootPlayer: PlayerId, depth: number): number => {
  if (depth === 0 || state.phase === 'over') {
    return evaluateState(def, state, rootPlayer);
  }

  const plays = legalPlays(def, state);
  if (plays.length === 0) {
    return evaluateState(def, state, rootPlayer);
  }

  const maximizing = state.activePlayer === rootPlayer;
  let best = maximizing ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  for (const play of plays) {
    const value = minimax(def, simulateTurn(def, state, play), rootPlayer, depth - 1);
    best = maximizing ? Math.max(best, value) : Math.min(best, value);
  }
  return best;
};

/**
 * Depth-limited minimax where one ply is one player turn. The search reads
 * the deck order and face-down cards from the state it is given.
 */
export class LookaheadAgent implements Agent {
  readonly depth: number;

  constructor(config: LookaheadAgentConfig = {}) {
    const depth = config.depth ?? DEFAULT_LOOKAHEAD_DEPTH;
    if (!Number.isSafeInteger(depth) || depth < 1 || depth > MAX_LOOKAHEAD_DEPTH) {
      throw new RangeError(`LookaheadAgent depth must be an integer between 1 and ${MAX_LOOKAHEAD_DEPTH}`);
    }
    this.depth = depth;
  }

  chooseAction(input: Parameters<Agent['chooseAction']>[0]): ReturnType<Agent['chooseAction']> {
    if (input.legal.length === 0) {
      throw new Error('LookaheadAgent.chooseAction called with empty legal options');
    }

    let bestAction: PlayAction | undefined;
    let bestValue = Number.NEGATIVE_INFINITY;
    for (const action of input.legal) {
      const value = minimax(input.def, simulateTurn(input.def, input.state, action), input.playerId, this.depth - 1);
      if (bestAction === undefined || value > bestValue) {
        bestValue = value;
        bestAction = action;
      }
    }

    if (bestAction === undefined) {
      throw new Error('LookaheadAgent.chooseAction could not select an action');
    }
    return { selected: bestAction, rng: input.rng };
  }

  chooseDraw(input: Parameters<Agent['chooseDraw']>[0]): ReturnType<Agent['chooseDraw']> {
    const selected = input.legal[greedyDrawIndex(input.def, input.state, input.legal)];
    if (selected === undefined) {
      throw new Error('LookaheadAgent.chooseDraw called with empty legal options');
    }
    return { selected, rng: input.rng };
  }

  chooseOption(input: Parameters<Agent['chooseOption']>[0]): ReturnType<Agent['chooseOption']> {
    const selected = input.request.options[greedyOptionIndex(input.def, input.state)];
    if (selected === undefined) {
      throw new Error(`LookaheadAgent.chooseOption found no option for ${input.request.kind}`);
    }
    return { selected, rng: input.rng };
  }
}

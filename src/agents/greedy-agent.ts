import { applyAction } from '../kernel/apply-action.js';
import type { Agent, GameState, PlayAction } from '../kernel/types.js';
import { compareOutcomes, greedyDrawIndex, greedyOptionIndex, outcomeFor, resolvePendingGreedily } from './greedy-policy.js';
import type { Outcome } from './greedy-policy.js';

/**
 * One-ply policy. Each legal play is resolved through the kernel with its
 * sub-choices answered greedily, then ranked by score differential and
 * heuristic potential; the earliest play wins ties.
 */
export class GreedyAgent implements Agent {
  chooseAction(input: Parameters<Agent['chooseAction']>[0]): ReturnType<Agent['chooseAction']> {
    if (input.legal.length === 0) {
      throw new Error('GreedyAgent.chooseAction called with empty legal options');
    }

    let best: { readonly action: PlayAction; readonly outcome: Outcome } | undefined;
    for (const action of input.legal) {
      const resolved: GameState = resolvePendingGreedily(input.def, applyAction(input.def, input.state, action));
      const outcome = outcomeFor(input.def, resolved, input.playerId);
      if (best === undefined || compareOutcomes(outcome, best.outcome) > 0) {
        best = { action, outcome };
      }
    }

    if (best === undefined) {
      throw new Error('GreedyAgent.chooseAction could not select an action');
    }
    return { selected: best.action, rng: input.rng };
  }

  chooseDraw(input: Parameters<Agent['chooseDraw']>[0]): ReturnType<Agent['chooseDraw']> {
    if (input.legal.length === 0) {
      throw new Error('GreedyAgent.chooseDraw called with empty legal options');
    }
    const selected = input.legal[greedyDrawIndex(input.def, input.state, input.legal)];
    if (selected === undefined) {
      throw new Error('GreedyAgent.chooseDraw selected an out-of-range draw');
    }
    return { selected, rng: input.rng };
  }

  chooseOption(input: Parameters<Agent['chooseOption']>[0]): ReturnType<Agent['chooseOption']> {
    if (input.legal.length === 0) {
      throw new Error('GreedyAgent.chooseOption called with empty legal options');
    }
    const selected = input.request.options[greedyOptionIndex(input.def, input.state)];
    if (selected === undefined) {
      throw new Error(`GreedyAgent.chooseOption selected an out-of-range option for ${input.request.kind}`);
    }
    return { selected, rng: input.rng };
  }
}

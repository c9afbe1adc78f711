import { indexOptions, expectIndex } from './decisions.js';
import { appendEvent } from './event-log.js';
import { stateInvariantError } from './runtime-error.js';
import { requestChoice } from './step-context.js';
import type { StepContext } from './step-context.js';
import type { CardInstance } from './types.js';
import { MARKET_CAPACITY, resetInstance } from './zones.js';
import type { WorkingState } from './zones.js';

/** Appends a card face up; the active player trashes market cards until the cap holds again. */
export const addToMarket = (ctx: StepContext, card: CardInstance): void => {
  const { work } = ctx;
  work.market.push(resetInstance(card));

  while (work.market.length > MARKET_CAPACITY) {
    const index = expectIndex(
      requestChoice(ctx, {
        kind: 'trash',
        player: work.activePlayer,
        source: card.name,
        prompt: `Market is over capacity: choose a market card to trash`,
        options: indexOptions(work.market.length),
      }),
    );
    const [trashed] = work.market.splice(index, 1);
    if (trashed === undefined) {
      throw stateInvariantError(`market trash index ${index} out of range`);
    }
    work.trash.push(trashed);
    appendEvent(work, 'trash', work.activePlayer, `${trashed.name} trashed from the market`, { card: trashed.name });
  }
};

export const takeFromMarket = (work: WorkingState, index: number): CardInstance => {
  const [taken] = work.market.splice(index, 1);
  if (taken === undefined) {
    throw stateInvariantError(`market index ${index} out of range`);
  }
  return taken;
};

/** Tops the market up from the deck head. */
export const refillMarket = (work: WorkingState): void => {
  while (work.market.length < MARKET_CAPACITY) {
    const next = work.deck.shift();
    if (next === undefined) {
      return;
    }
    work.market.push(next);
    appendEvent(work, 'refill', work.activePlayer, `${next.name} revealed in the market`, { card: next.name });
  }
};

import { getCardDefinition } from './card-catalog.js';
import type { DrawChoice, GameDef, GameState, PlayAction, Side } from './types.js';
import { isMarketLocked, isOnCooldown, playerOf } from './zones.js';
import type { TableView } from './zones.js';

const SIDES: readonly Side[] = ['left', 'right'];

/**
 * Plays open to the active player, ordered by hand index, then side
 * (left first), then face up before face down.
 */
export const enumeratePlays = (def: GameDef, view: TableView): readonly PlayAction[] => {
  const player = view.activePlayer;
  const plays: PlayAction[] = [];

  playerOf(view, player).hand.forEach((card, handIndex) => {
    if (isOnCooldown(view, player, card.id)) {
      return;
    }
    const canHide = getCardDefinition(def.catalog, card.name).category === 'trap';
    for (const side of SIDES) {
      plays.push({ handIndex, side, faceDown: false });
      if (canHide) {
        plays.push({ handIndex, side, faceDown: true });
      }
    }
  });

  return plays;
};

/** Draw sources open to the active player: the deck first, then market slots in order. */
export const enumerateDraws = (view: TableView): readonly DrawChoice[] => {
  const draws: DrawChoice[] = [];
  if (view.deck.length > 0) {
    draws.push({ source: 'deck' });
  }
  if (!isMarketLocked(view, view.activePlayer)) {
    view.market.forEach((_, marketIndex) => {
      draws.push({ source: 'market', marketIndex });
    });
  }
  return draws;
};

export const legalPlays = (def: GameDef, state: GameState): readonly PlayAction[] =>
  state.phase === 'play' && state.pending === null ? enumeratePlays(def, state) : [];

export const legalDraws = (state: GameState): readonly DrawChoice[] =>
  state.phase === 'draw' && state.pending === null ? enumerateDraws(state) : [];

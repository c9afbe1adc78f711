import { asCardName, asInstanceId, PLAYER_IDS } from './branded.js';
import { appendEvent } from './event-log.js';
import { refillMarket } from './market.js';
import { createRng, shuffle } from './prng.js';
import { openTurn } from './turn-steps.js';
import type { CardInstance, GameDef, GameState } from './types.js';
import { HAND_LIMIT, fromWorkingState, playerOf } from './zones.js';
import type { WorkingState } from './zones.js';

const deckNames = (def: GameDef): readonly string[] => def.config.deck ?? def.catalog.cards.map((card) => card.name);

/** One instance per physical card, numbered in configured deck order before the shuffle. */
export const createCardInstances = (def: GameDef): readonly CardInstance[] =>
  deckNames(def).map((name, index) => ({
    id: asInstanceId(`card-${index}`),
    name: asCardName(name),
    faceDown: false,
    meta: {},
  }));

/**
 * Shuffles the deck from the seed, deals two cards to each player
 * alternately from the deck head, then lays out the market.
 */
export const createInitialState = (def: GameDef, seed: number): GameState => {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`seed must be a safe integer, received ${String(seed)}`);
  }

  const [deck] = shuffle(createCardInstances(def), createRng(BigInt(seed)));
  const work: WorkingState = {
    players: [
      { hand: [], row: [], score: 0 },
      { hand: [], row: [], score: 0 },
    ],
    market: [],
    deck: [...deck],
    trash: [],
    removed: [],
    activeEffects: [],
    turn: 1,
    activePlayer: PLAYER_IDS[0],
    phase: 'play',
    log: [],
  };

  for (let round = 0; round < HAND_LIMIT; round += 1) {
    for (const player of PLAYER_IDS) {
      const card = work.deck.shift();
      if (card === undefined) {
        continue;
      }
      playerOf(work, player).hand.push(card);
    }
  }
  for (const player of PLAYER_IDS) {
    appendEvent(work, 'deal', player, `Dealt ${playerOf(work, player).hand.length} cards`);
  }
  refillMarket(work);
  openTurn(def, work);

  return fromWorkingState(work);
};

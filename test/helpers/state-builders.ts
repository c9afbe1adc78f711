import {
  asCardName,
  asInstanceId,
  asPlayerId,
  createGameDef,
  defaultCardCatalog,
  resolveChoice,
} from '../../src/kernel/index.js';
import type {
  ActiveEffect,
  CardInstance,
  ChoiceOption,
  GameConfigInput,
  GameDef,
  GameEvent,
  GamePhase,
  GameState,
  InstanceMeta,
  PlayerId,
} from '../../src/kernel/index.js';

export const testDef = (config: GameConfigInput = {}): GameDef => createGameDef(defaultCardCatalog(), config);

const slug = (name: string): string => name.toLowerCase().replace(/[^a-z]+/g, '-');

/** A face-up instance whose id defaults to the slugged card name. */
export const card = (
  name: string,
  options: { readonly id?: string; readonly faceDown?: boolean; readonly meta?: InstanceMeta } = {},
): CardInstance => ({
  id: asInstanceId(options.id ?? slug(name)),
  name: asCardName(name),
  faceDown: options.faceDown ?? false,
  meta: options.meta ?? {},
});

export const hidden = (name: string, id?: string): CardInstance =>
  card(name, { faceDown: true, ...(id === undefined ? {} : { id }) });

export interface PlayerSetup {
  readonly hand?: readonly CardInstance[];
  readonly row?: readonly CardInstance[];
  readonly score?: number;
}

export interface StateSetup {
  readonly p0?: PlayerSetup;
  readonly p1?: PlayerSetup;
  readonly market?: readonly CardInstance[];
  readonly deck?: readonly CardInstance[];
  readonly trash?: readonly CardInstance[];
  readonly removed?: readonly CardInstance[];
  readonly activeEffects?: readonly ActiveEffect[];
  readonly turn?: number;
  readonly activePlayer?: 0 | 1;
  readonly phase?: GamePhase;
  readonly log?: readonly GameEvent[];
}

const DEFAULT_DECK: readonly string[] = ['Void', 'Copycat', 'Hot Potato'];

/**
 * A mid-game state with exactly the given zones. The deck defaults to three
 * low-value filler cards so a finished play still has a draw available.
 */
export const buildState = (setup: StateSetup = {}): GameState => ({
  players: [
    { hand: setup.p0?.hand ?? [], row: setup.p0?.row ?? [], score: setup.p0?.score ?? 0 },
    { hand: setup.p1?.hand ?? [], row: setup.p1?.row ?? [], score: setup.p1?.score ?? 0 },
  ],
  market: setup.market ?? [],
  deck: setup.deck ?? DEFAULT_DECK.map((name) => card(name, { id: `deck-${slug(name)}` })),
  trash: setup.trash ?? [],
  removed: setup.removed ?? [],
  activeEffects: setup.activeEffects ?? [],
  turn: setup.turn ?? 1,
  activePlayer: asPlayerId(setup.activePlayer ?? 0),
  phase: setup.phase ?? 'play',
  pending: null,
  log: setup.log ?? [],
});

export const P0: PlayerId = asPlayerId(0);
export const P1: PlayerId = asPlayerId(1);

export const names = (cards: readonly CardInstance[]): readonly string[] => cards.map((entry) => entry.name);
export const ids = (cards: readonly CardInstance[]): readonly string[] => cards.map((entry) => entry.id);

export const side = (value: 'left' | 'right'): ChoiceOption => ({ type: 'side', side: value });
export const index = (value: number): ChoiceOption => ({ type: 'index', index: value });
export const slot = (player: 0 | 1, value: number): ChoiceOption => ({ type: 'slot', player: asPlayerId(player), index: value });
export const SKIP: ChoiceOption = { type: 'skip' };

export const resolveAll = (def: GameDef, state: GameState, options: readonly ChoiceOption[]): GameState =>
  options.reduce((current, option) => resolveChoice(def, current, option), state);

import { opponentOf } from './branded.js';
import type { InstanceId, PlayerId } from './branded.js';
import { getCardDefinition } from './card-catalog.js';
import { ALL_ICONS } from './types.js';
import type {
  ActiveEffect,
  CardDefinition,
  CardInstance,
  ChoiceView,
  GameDef,
  GameEvent,
  GamePhase,
  GameState,
  Icon,
  PlayerState,
} from './types.js';

export const ROW_CAPACITY = 3;
export const HAND_LIMIT = 2;
export const MARKET_CAPACITY = 3;
export const CENTER_INDEX = 1;

export interface WorkingPlayer {
  hand: CardInstance[];
  row: CardInstance[];
  score: number;
}

/** Mutable copy of a GameState used while a single step resolves. */
export interface WorkingState {
  players: [WorkingPlayer, WorkingPlayer];
  market: CardInstance[];
  deck: CardInstance[];
  trash: CardInstance[];
  removed: CardInstance[];
  activeEffects: ActiveEffect[];
  turn: number;
  activePlayer: PlayerId;
  phase: GamePhase;
  log: GameEvent[];
}

export type TableView = Pick<GameState, 'players' | 'market' | 'deck' | 'activeEffects' | 'turn' | 'activePlayer'>;

const toWorkingPlayer = (player: PlayerState): WorkingPlayer => ({
  hand: [...player.hand],
  row: [...player.row],
  score: player.score,
});

export const toWorkingState = (state: GameState): WorkingState => ({
  players: [toWorkingPlayer(state.players[0]), toWorkingPlayer(state.players[1])],
  market: [...state.market],
  deck: [...state.deck],
  trash: [...state.trash],
  removed: [...state.removed],
  activeEffects: [...state.activeEffects],
  turn: state.turn,
  activePlayer: state.activePlayer,
  phase: state.phase,
  log: [...state.log],
});

export const fromWorkingState = (work: WorkingState): GameState => ({
  players: [
    { hand: [...work.players[0].hand], row: [...work.players[0].row], score: work.players[0].score },
    { hand: [...work.players[1].hand], row: [...work.players[1].row], score: work.players[1].score },
  ],
  market: [...work.market],
  deck: [...work.deck],
  trash: [...work.trash],
  removed: [...work.removed],
  activeEffects: [...work.activeEffects],
  turn: work.turn,
  activePlayer: work.activePlayer,
  phase: work.phase,
  pending: null,
  log: [...work.log],
});

export const choiceViewOf = (work: WorkingState): ChoiceView => {
  const { players, market, trash, removed } = fromWorkingState(work);
  return { players, market, trash, removed };
};

export function playerOf(state: WorkingState, player: PlayerId): WorkingPlayer;
export function playerOf(state: TableView, player: PlayerId): PlayerState;
export function playerOf(state: TableView | WorkingState, player: PlayerId): PlayerState | WorkingPlayer {
  return player === 0 ? state.players[0] : state.players[1];
}

export const opponentStateOf = (state: WorkingState, player: PlayerId): WorkingPlayer => playerOf(state, opponentOf(player));

export const definitionOf = (def: GameDef, card: CardInstance): CardDefinition => getCardDefinition(def.catalog, card.name);

/** Icons a row card shows for adjacency: none while face down. */
export const effectiveIcons = (def: GameDef, card: CardInstance): readonly Icon[] => {
  if (card.faceDown) {
    return [];
  }
  if (card.meta.allIcons === true) {
    return ALL_ICONS;
  }
  if (card.meta.mimickedIcon !== undefined) {
    return [card.meta.mimickedIcon];
  }
  const { icon } = definitionOf(def, card);
  return icon === null ? [] : [icon];
};

export const sharesIcon = (left: readonly Icon[], right: readonly Icon[]): boolean =>
  left.some((icon) => right.includes(icon));

/** Cards leaving a row lose their face-down state and effect metadata. */
export const resetInstance = (card: CardInstance): CardInstance =>
  card.faceDown === false && Object.keys(card.meta).length === 0 ? card : { id: card.id, name: card.name, faceDown: false, meta: {} };

export const centerOf = (row: readonly CardInstance[]): CardInstance | null =>
  row.length === ROW_CAPACITY ? row[CENTER_INDEX] ?? null : null;

export const updateRowCard = (
  row: CardInstance[],
  id: InstanceId,
  update: (card: CardInstance) => CardInstance,
): boolean => {
  const index = row.findIndex((card) => card.id === id);
  const card = row[index];
  if (card === undefined) {
    return false;
  }
  row[index] = update(card);
  return true;
};

export const isEffectLive = (effect: ActiveEffect, turn: number): boolean =>
  effect.expiresTurn === null || effect.expiresTurn > turn;

export const isMarketLocked = (view: Pick<GameState, 'activeEffects' | 'turn'>, player: PlayerId): boolean =>
  view.activeEffects.some((effect) => effect.kind === 'marketLock' && effect.owner !== player && isEffectLive(effect, view.turn));

export const isOnCooldown = (view: Pick<GameState, 'activeEffects' | 'turn'>, player: PlayerId, card: InstanceId): boolean =>
  view.activeEffects.some(
    (effect) => effect.kind === 'playCooldown' && effect.owner === player && effect.card === card && isEffectLive(effect, view.turn),
  );

/** Every instance in play or set aside, in zone order; used for conservation audits. */
export const allCardInstances = (state: GameState): readonly CardInstance[] => [
  ...state.players[0].hand,
  ...state.players[0].row,
  ...state.players[1].hand,
  ...state.players[1].row,
  ...state.market,
  ...state.deck,
  ...state.trash,
  ...state.removed,
];

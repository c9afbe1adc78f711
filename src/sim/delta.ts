import { PLAYER_IDS } from '../kernel/branded.js';
import type { CardInstance, GameState, StateDelta } from '../kernel/types.js';
import { playerOf } from '../kernel/zones.js';

const sortedUnionKeys = (
  left: Readonly<Record<string, unknown>>,
  right: Readonly<Record<string, unknown>>,
): readonly string[] => {
  const keySet = new Set<string>();
  for (const key of Object.keys(left)) {
    keySet.add(key);
  }
  for (const key of Object.keys(right)) {
    keySet.add(key);
  }
  return Array.from(keySet).sort((a, b) => a.localeCompare(b));
};

const arraysEqual = (left: readonly unknown[], right: readonly unknown[]): boolean => {
  if (left.length !== right.length) {
    return false;
  }
  for (let index = 0; index < left.length; index += 1) {
    if (!Object.is(left[index], right[index])) {
      return false;
    }
  }
  return true;
};

const cardIds = (cards: readonly CardInstance[]): readonly string[] => cards.map((card) => card.id);

const zoneCardIds = (state: GameState): Readonly<Record<string, readonly string[]>> => {
  const zones: Record<string, readonly string[]> = {
    market: cardIds(state.market),
    deck: cardIds(state.deck),
    trash: cardIds(state.trash),
    removed: cardIds(state.removed),
  };
  for (const player of PLAYER_IDS) {
    const { hand, row } = playerOf(state, player);
    zones[`players.${player}.hand`] = cardIds(hand);
    zones[`players.${player}.row`] = cardIds(row);
  }
  return zones;
};

const pushScalar = (deltas: StateDelta[], path: string, before: unknown, after: unknown): void => {
  if (!Object.is(before, after)) {
    deltas.push({ path, before, after });
  }
};

/** Changes between two states as sorted paths: scores, zone contents by card id and turn bookkeeping. */
export const computeDeltas = (preState: GameState, postState: GameState): readonly StateDelta[] => {
  const deltas: StateDelta[] = [];

  for (const player of PLAYER_IDS) {
    pushScalar(deltas, `players.${player}.score`, playerOf(preState, player).score, playerOf(postState, player).score);
  }

  const preZones = zoneCardIds(preState);
  const postZones = zoneCardIds(postState);
  for (const zoneId of sortedUnionKeys(preZones, postZones)) {
    const before = preZones[zoneId] ?? [];
    const after = postZones[zoneId] ?? [];
    if (!arraysEqual(before, after)) {
      deltas.push({ path: zoneId, before, after });
    }
  }

  pushScalar(deltas, 'phase', preState.phase, postState.phase);
  pushScalar(deltas, 'activePlayer', preState.activePlayer, postState.activePlayer);
  pushScalar(deltas, 'turn', preState.turn, postState.turn);
  pushScalar(deltas, 'pending', preState.pending?.request.kind ?? null, postState.pending?.request.kind ?? null);

  deltas.sort((left, right) => left.path.localeCompare(right.path));
  return deltas;
};

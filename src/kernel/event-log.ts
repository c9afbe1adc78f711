import type { CardName, PlayerId } from './branded.js';
import type { GameEvent, GameEventKind } from './types.js';
import type { WorkingState } from './zones.js';

export interface EventDetail {
  readonly card?: CardName;
  readonly points?: number;
}

export const appendEvent = (
  work: WorkingState,
  kind: GameEventKind,
  player: PlayerId,
  message: string,
  detail: EventDetail = {},
): void => {
  const event: GameEvent = {
    kind,
    player,
    turn: work.turn,
    message,
    ...(detail.card === undefined ? {} : { card: detail.card }),
    ...(detail.points === undefined ? {} : { points: detail.points }),
  };
  work.log.push(Object.freeze(event));
};

export const eventsOfKind = (log: readonly GameEvent[], kind: GameEventKind): readonly GameEvent[] =>
  log.filter((event) => event.kind === kind);

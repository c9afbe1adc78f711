import { opponentOf } from './branded.js';
import type { PlayerId } from './branded.js';
import { appendEvent } from './event-log.js';
import type { StepContext } from './step-context.js';
import type { CardInstance, TrapCardDefinition, TrapTrigger } from './types.js';
import { centerOf, definitionOf, effectiveIcons, playerOf, sharesIcon, updateRowCard } from './zones.js';

export type TrapEvent =
  | { readonly kind: 'centerScore'; readonly player: PlayerId; readonly points: number; readonly card: CardInstance }
  | { readonly kind: 'marketDraw'; readonly player: PlayerId; readonly card: CardInstance }
  | { readonly kind: 'play'; readonly player: PlayerId; readonly card: CardInstance };

export interface TrapOutcome {
  readonly redirectTo: PlayerId | null;
  readonly diverted: boolean;
  /** Points taken back from the event player by cancelling traps. */
  readonly cancelledPoints: number;
}

const NO_OUTCOME: TrapOutcome = { redirectTo: null, diverted: false, cancelledPoints: 0 };

const triggerMatches = (ctx: StepContext, trigger: TrapTrigger, owner: PlayerId, event: TrapEvent): boolean => {
  switch (trigger.kind) {
    case 'opponentCenterScore':
      return event.kind === 'centerScore' && event.points > 0;
    case 'opponentMarketDraw':
      return event.kind === 'marketDraw';
    case 'opponentPlaysCenterIcon': {
      if (event.kind !== 'play') {
        return false;
      }
      const center = centerOf(playerOf(ctx.work, owner).row);
      return center !== null && sharesIcon(effectiveIcons(ctx.def, event.card), effectiveIcons(ctx.def, center));
    }
  }
};

/**
 * Checks the face-down traps of the event player's opponent, left to right.
 * Each match flips face up and resolves once.
 */
export const dispatchTrapEvent = (ctx: StepContext, event: TrapEvent): TrapOutcome => {
  const { work } = ctx;
  const owner = opponentOf(event.player);
  let redirectTo: PlayerId | null = null;
  let diverted = false;
  let cancelledPoints = 0;

  const candidates = playerOf(work, owner).row.filter((card) => card.faceDown);
  for (const trap of candidates) {
    const definition = definitionOf(ctx.def, trap);
    if (definition.category !== 'trap' || !triggerMatches(ctx, definition.trigger, owner, event)) {
      continue;
    }
    if (!updateRowCard(playerOf(work, owner).row, trap.id, (card) => ({ ...card, faceDown: false }))) {
      continue;
    }
    appendEvent(work, 'trapRevealed', owner, `${definition.name} revealed`, { card: definition.name });

    const result = resolveTrapEffect(ctx, owner, definition, event);
    redirectTo = result.redirectTo ?? redirectTo;
    diverted = diverted || result.diverted;
    cancelledPoints += result.cancelledPoints;
  }

  return { redirectTo, diverted, cancelledPoints };
};

const resolveTrapEffect = (
  ctx: StepContext,
  owner: PlayerId,
  definition: TrapCardDefinition,
  event: TrapEvent,
): TrapOutcome => {
  const { work } = ctx;
  const { effect } = definition;
  switch (effect.kind) {
    case 'cancelScore': {
      if (event.kind !== 'centerScore') {
        return NO_OUTCOME;
      }
      playerOf(work, event.player).score -= event.points;
      playerOf(work, owner).score += effect.ownerPoints;
      appendEvent(work, 'effect', owner, `${definition.name} cancelled ${event.points} points from ${event.card.name}`, {
        card: definition.name,
        points: effect.ownerPoints,
      });
      return { ...NO_OUTCOME, cancelledPoints: event.points };
    }
    case 'mirrorScore': {
      if (event.kind !== 'centerScore') {
        return NO_OUTCOME;
      }
      playerOf(work, owner).score += event.points;
      appendEvent(work, 'effect', owner, `${definition.name} mirrored ${event.points} points`, {
        card: definition.name,
        points: event.points,
      });
      return NO_OUTCOME;
    }
    case 'redirectDraw':
      appendEvent(work, 'effect', owner, `${definition.name} redirected ${event.card.name}`, { card: definition.name });
      return { ...NO_OUTCOME, redirectTo: owner };
    case 'divertPlay':
      appendEvent(work, 'effect', owner, `${definition.name} diverted ${event.card.name} to the market`, {
        card: definition.name,
      });
      return { ...NO_OUTCOME, diverted: true };
  }
};

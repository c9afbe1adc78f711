import { opponentOf } from './branded.js';
import type { InstanceId, PlayerId } from './branded.js';
import { expectIndex, expectSide, indexOptions, optionKey, sideOptions, slotOption } from './decisions.js';
import { dispatchTrapEvent } from './effects-trap.js';
import { forceEdgePush, pushOut } from './effects-exit.js';
import { appendEvent } from './event-log.js';
import { roundOf } from './game-config.js';
import { addToHand } from './hand-limit.js';
import { takeFromMarket } from './market.js';
import { stateInvariantError } from './runtime-error.js';
import { requestChoice } from './step-context.js';
import type { StepContext } from './step-context.js';
import type { CardInstance, CenterCardDefinition, ChoiceOption, Icon, RoundParity, Side } from './types.js';
import {
  ROW_CAPACITY,
  definitionOf,
  effectiveIcons,
  playerOf,
  resetInstance,
  sharesIcon,
  updateRowCard,
} from './zones.js';

interface Placement {
  readonly row: CardInstance[];
  readonly index: number;
  readonly card: CardInstance | undefined;
}

const locate = (ctx: StepContext, owner: PlayerId, id: InstanceId): Placement => {
  const row = playerOf(ctx.work, owner).row;
  const index = row.findIndex((card) => card.id === id);
  return { row, index, card: row[index] };
};

const neighbours = (placement: Placement): readonly [CardInstance | undefined, CardInstance | undefined] =>
  placement.card === undefined
    ? [undefined, undefined]
    : [placement.row[placement.index - 1], placement.row[placement.index + 1]];

const neighbourSides = (placement: Placement): readonly Side[] => {
  const [left, right] = neighbours(placement);
  return [...(left === undefined ? [] : ['left' as const]), ...(right === undefined ? [] : ['right' as const])];
};

/**
 * Credits a center score to the owner and lets opposing traps react. The
 * card's `lastCenterScore` accumulates what the owner kept over the passes
 * of the current resolution.
 */
const creditCenterScore = (
  ctx: StepContext,
  owner: PlayerId,
  card: CardInstance,
  definition: CenterCardDefinition,
  points: number,
): void => {
  const { work } = ctx;
  let kept = 0;
  if (points <= 0) {
    appendEvent(work, 'centerScored', owner, `${definition.name} resolved for 0 points`, { card: definition.name, points: 0 });
  } else {
    playerOf(work, owner).score += points;
    appendEvent(work, 'centerScored', owner, `${definition.name} scored ${points}`, { card: definition.name, points });
    const { cancelledPoints } = dispatchTrapEvent(ctx, { kind: 'centerScore', player: owner, points, card });
    kept = Math.max(0, points - cancelledPoints);
  }

  updateRowCard(playerOf(work, owner).row, card.id, (current) => ({
    ...current,
    meta: { ...current.meta, lastCenterScore: (current.meta.lastCenterScore ?? 0) + kept },
  }));
};

const matchesRoundParity = (turn: number, parity: RoundParity): boolean =>
  (roundOf(turn) % 2 === 0) === (parity === 'even');

const rowIconUnion = (ctx: StepContext, row: readonly CardInstance[]): ReadonlySet<Icon> =>
  new Set(row.flatMap((card) => effectiveIcons(ctx.def, card)));

const swapTargets = (ctx: StepContext, owner: PlayerId): readonly ChoiceOption[] => {
  const opponent = opponentOf(owner);
  const options: ChoiceOption[] = [];
  playerOf(ctx.work, opponent).row.forEach((target, index) => {
    const definition = definitionOf(ctx.def, target);
    if (!target.faceDown && definition.category === 'center' && definition.effect.kind === 'swapWithOpponent') {
      return;
    }
    options.push(slotOption(opponent, index));
  });
  return options;
};

const swapAcrossRows = (
  ctx: StepContext,
  owner: PlayerId,
  id: InstanceId,
  target: ChoiceOption,
): void => {
  if (target.type !== 'slot') {
    throw stateInvariantError(`expected a slot option, received ${optionKey(target)}`);
  }
  const source = locate(ctx, owner, id);
  const targetRow = playerOf(ctx.work, target.player).row;
  const other = targetRow[target.index];
  if (source.card === undefined || other === undefined) {
    throw stateInvariantError('swap endpoints are missing');
  }
  targetRow[target.index] = source.card;
  source.row[source.index] = other;
};

/**
 * Runs one resolution of a center effect. Positional parts are skipped when
 * the card is no longer in its owner's row, which only a repeat can observe.
 */
const applyCenterEffect = (ctx: StepContext, owner: PlayerId, id: InstanceId, definition: CenterCardDefinition): void => {
  const { work } = ctx;
  const placement = locate(ctx, owner, id);
  const card = placement.card;
  if (card === undefined) {
    appendEvent(work, 'effect', owner, `${definition.name} is no longer in the row`, { card: definition.name });
    return;
  }
  const { effect } = definition;
  const opponent = opponentOf(owner);

  switch (effect.kind) {
    case 'score':
      creditCenterScore(ctx, owner, card, definition, effect.points);
      return;
    case 'parityScore':
      creditCenterScore(ctx, owner, card, definition, matchesRoundParity(work.turn, effect.roundParity) ? effect.points : 0);
      return;
    case 'lonerBonus': {
      const own = effectiveIcons(ctx.def, card);
      const shared = neighbours(placement).some(
        (neighbour) => neighbour !== undefined && sharesIcon(own, effectiveIcons(ctx.def, neighbour)),
      );
      creditCenterScore(ctx, owner, card, definition, shared ? 0 : effect.points);
      return;
    }
    case 'copyNeighbours': {
      const [left, right] = neighbours(placement);
      const points = Math.min(left?.meta.lastCenterScore ?? 0, right?.meta.lastCenterScore ?? 0);
      creditCenterScore(ctx, owner, card, definition, points);
      return;
    }
    case 'siphon':
      creditCenterScore(ctx, owner, card, definition, effect.points);
      playerOf(work, opponent).score += effect.opponentPoints;
      appendEvent(work, 'effect', opponent, `${definition.name} gave the opponent ${effect.opponentPoints}`, {
        card: definition.name,
        points: effect.opponentPoints,
      });
      return;
    case 'sharedIconsWithOpponent': {
      const own = effectiveIcons(ctx.def, card);
      const matches = playerOf(work, opponent).row.filter((other) => sharesIcon(own, effectiveIcons(ctx.def, other))).length;
      creditCenterScore(ctx, owner, card, definition, matches * effect.pointsPerCard);
      return;
    }
    case 'iconVariety': {
      const distinct = rowIconUnion(ctx, placement.row).size;
      creditCenterScore(ctx, owner, card, definition, distinct === effect.distinct ? effect.points : effect.fallbackPoints);
      return;
    }
    case 'selfPush': {
      creditCenterScore(ctx, owner, card, definition, effect.points);
      const sides = neighbourSides(locate(ctx, owner, id));
      if (sides.length === 0) {
        return;
      }
      const side = expectSide(
        requestChoice(ctx, {
          kind: 'pushDirection',
          player: owner,
          source: definition.name,
          prompt: `Choose the edge ${definition.name} moves toward`,
          options: sideOptions(sides),
        }),
      );
      pushOut(ctx, owner, side);
      return;
    }
    case 'markTurn':
      updateRowCard(placement.row, id, (current) => ({ ...current, meta: { ...current.meta, markedTurn: work.turn } }));
      appendEvent(work, 'effect', owner, `${definition.name} marked round ${roundOf(work.turn)}`, { card: definition.name });
      creditCenterScore(ctx, owner, card, definition, 0);
      return;
    case 'swapWithOpponent': {
      creditCenterScore(ctx, owner, card, definition, effect.points);
      const targets = swapTargets(ctx, owner);
      if (targets.length === 0) {
        return;
      }
      const target = requestChoice(ctx, {
        kind: 'swapTarget',
        player: owner,
        source: definition.name,
        prompt: "Choose a card in your opponent's row to swap with",
        options: targets,
      });
      swapAcrossRows(ctx, owner, id, target);
      appendEvent(work, 'effect', owner, `${definition.name} swapped rows`, { card: definition.name });
      return;
    }
    case 'emptySlots': {
      const empty = work.players.reduce((total, player) => total + Math.max(0, ROW_CAPACITY - player.row.length), 0);
      creditCenterScore(ctx, owner, card, definition, empty * effect.pointsPerSlot);
      return;
    }
    case 'rowSize':
      creditCenterScore(ctx, owner, card, definition, placement.row.length === effect.size ? effect.points : 0);
      return;
    case 'mimicLeft': {
      const [left] = neighbours(placement);
      const leftIcon = left === undefined || left.faceDown ? null : definitionOf(ctx.def, left).icon;
      if (leftIcon !== null) {
        updateRowCard(placement.row, id, (current) => ({ ...current, meta: { ...current.meta, mimickedIcon: leftIcon } }));
        appendEvent(work, 'effect', owner, `${definition.name} now shows ${leftIcon}`, { card: definition.name });
      }
      creditCenterScore(ctx, owner, card, definition, effect.points);
      return;
    }
    case 'forceOpponentPush':
      creditCenterScore(ctx, owner, card, definition, effect.points);
      if (playerOf(work, opponent).row.length === ROW_CAPACITY) {
        forceEdgePush(ctx, opponent, definition.name);
      }
      return;
    case 'allIcons':
      updateRowCard(placement.row, id, (current) => ({ ...current, meta: { ...current.meta, allIcons: true } }));
      creditCenterScore(ctx, owner, card, definition, effect.points);
      return;
    case 'selfRemove': {
      creditCenterScore(ctx, owner, card, definition, effect.points);
      const current = locate(ctx, owner, id);
      if (current.card !== undefined) {
        current.row.splice(current.index, 1);
        work.removed.push(resetInstance(current.card));
        appendEvent(work, 'effect', owner, `${definition.name} removed itself from the game`, { card: definition.name });
      }
      return;
    }
    case 'marketLock':
      creditCenterScore(ctx, owner, card, definition, effect.points);
      work.activeEffects.push({
        kind: 'marketLock',
        owner,
        source: id,
        expiresTurn: work.turn + 2 * effect.opponentTurns,
      });
      appendEvent(work, 'effect', owner, `${definition.name} locked the opponent's market`, { card: definition.name });
      return;
    case 'scavenge': {
      creditCenterScore(ctx, owner, card, definition, 0);
      const slots: ChoiceOption[] = [];
      for (const player of [owner, opponent]) {
        playerOf(work, player).row.forEach((target, index) => {
          if (target.faceDown) {
            slots.push(slotOption(player, index));
          }
        });
      }
      if (slots.length === 0) {
        return;
      }
      const target = requestChoice(ctx, {
        kind: 'scavengeTarget',
        player: owner,
        source: definition.name,
        prompt: 'Choose a face-down card to swap with, or skip',
        options: [{ type: 'skip' }, ...slots],
      });
      if (target.type === 'skip') {
        return;
      }
      swapAcrossRows(ctx, owner, id, target);
      appendEvent(work, 'effect', owner, `${definition.name} swapped with a face-down card`, { card: definition.name });
      return;
    }
    case 'magnet': {
      creditCenterScore(ctx, owner, card, definition, effect.points);
      const sides = neighbourSides(locate(ctx, owner, id));
      if (work.market.length === 0 || sides.length === 0) {
        return;
      }
      const marketIndex = expectIndex(
        requestChoice(ctx, {
          kind: 'marketPick',
          player: owner,
          source: definition.name,
          prompt: 'Choose a market card to pull into your row',
          options: indexOptions(work.market.length),
        }),
      );
      const side = expectSide(
        requestChoice(ctx, {
          kind: 'placementSide',
          player: owner,
          source: definition.name,
          prompt: `Choose the side of ${definition.name} to place it`,
          options: sideOptions(sides),
        }),
      );
      const pulled = resetInstance(takeFromMarket(work, marketIndex));
      pushOut(ctx, owner, side);
      const row = playerOf(work, owner).row;
      if (side === 'left') {
        row.unshift(pulled);
      } else {
        row.push(pulled);
      }
      appendEvent(work, 'effect', owner, `${definition.name} pulled ${pulled.name} from the market`, { card: definition.name });
      return;
    }
    case 'giveToOpponent': {
      creditCenterScore(ctx, owner, card, definition, effect.points);
      const current = locate(ctx, owner, id);
      if (current.card === undefined) {
        return;
      }
      current.row.splice(current.index, 1);
      appendEvent(work, 'effect', owner, `${definition.name} went to the opponent's hand`, { card: definition.name });
      addToHand(ctx, opponent, current.card, id);
      return;
    }
  }
};

/** Resolves a credited center card, plus its conditional repeat when the round parity matches. */
export const resolveCenterCard = (ctx: StepContext, owner: PlayerId, card: CardInstance): void => {
  const definition = definitionOf(ctx.def, card);
  if (definition.category !== 'center') {
    return;
  }
  updateRowCard(playerOf(ctx.work, owner).row, card.id, (current) => ({
    ...current,
    meta: { ...current.meta, lastCenterScore: 0 },
  }));
  applyCenterEffect(ctx, owner, card.id, definition);

  const { repeat } = definition;
  if (repeat !== undefined && matchesRoundParity(ctx.work.turn, repeat.roundParity)) {
    appendEvent(ctx.work, 'effect', owner, `${definition.name} resolves again`, { card: definition.name });
    applyCenterEffect(ctx, owner, card.id, definition);
  }
};

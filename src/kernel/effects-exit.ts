import { opponentOf } from './branded.js';
import type { CardName, PlayerId } from './branded.js';
import { expectIndex, expectSide, indexOptions, sideOptions } from './decisions.js';
import { appendEvent } from './event-log.js';
import { addToHand } from './hand-limit.js';
import { addToMarket, takeFromMarket } from './market.js';
import { stateInvariantError } from './runtime-error.js';
import { requestChoice } from './step-context.js';
import type { StepContext } from './step-context.js';
import type { CardInstance, ExitCardDefinition, Side } from './types.js';
import { definitionOf, playerOf, resetInstance } from './zones.js';

/** Takes the edge card off a row. Nothing happens to the card yet. */
export const removeEdgeCard = (ctx: StepContext, owner: PlayerId, side: Side): CardInstance => {
  const { work } = ctx;
  const row = playerOf(work, owner).row;
  const card = side === 'left' ? row.shift() : row.pop();
  if (card === undefined) {
    throw stateInvariantError(`push from an empty row of player ${owner}`);
  }

  if (card.faceDown) {
    appendEvent(work, 'push', owner, `A face-down card was pushed out of the ${side} edge into the trash`);
  } else {
    const { name } = definitionOf(ctx.def, card);
    appendEvent(work, 'push', owner, `${name} pushed out of the ${side} edge`, { card: name });
  }
  return card;
};

/**
 * Sends a pushed card on: a face-up exit card resolves its exit effect
 * against its owner, a face-down trap goes to trash unrevealed, anything
 * else enters the market.
 */
export const disposePushedCard = (ctx: StepContext, owner: PlayerId, card: CardInstance): void => {
  if (card.faceDown) {
    ctx.work.trash.push(resetInstance(card));
    return;
  }

  const definition = definitionOf(ctx.def, card);
  if (definition.category === 'exit') {
    resolveExitEffect(ctx, owner, card, definition);
    return;
  }
  addToMarket(ctx, card);
};

export const pushOut = (ctx: StepContext, owner: PlayerId, side: Side): void => {
  disposePushedCard(ctx, owner, removeEdgeCard(ctx, owner, side));
};

/** Edges the victim may push: both when the row has two or more cards. */
export const pushableSides = (rowLength: number): readonly Side[] => {
  if (rowLength === 0) {
    return [];
  }
  return rowLength === 1 ? ['left'] : ['left', 'right'];
};

/** The victim chooses which of their own edge cards leaves. */
export const forceEdgePush = (ctx: StepContext, victim: PlayerId, source: CardName): void => {
  const sides = pushableSides(playerOf(ctx.work, victim).row.length);
  if (sides.length === 0) {
    return;
  }
  const side = expectSide(
    requestChoice(ctx, {
      kind: 'edgePush',
      player: victim,
      source,
      prompt: 'Choose an edge card of your row to push out',
      options: sideOptions(sides),
    }),
  );
  pushOut(ctx, victim, side);
};

const resolveExitEffect = (ctx: StepContext, owner: PlayerId, card: CardInstance, definition: ExitCardDefinition): void => {
  const { work } = ctx;
  const { effect } = definition;

  switch (effect.kind) {
    case 'score':
      playerOf(work, owner).score += effect.points;
      appendEvent(work, 'exitScored', owner, `${definition.name} scored ${effect.points} on exit`, {
        card: definition.name,
        points: effect.points,
      });
      addToMarket(ctx, card);
      return;
    case 'forceOpponentPush':
      forceEdgePush(ctx, opponentOf(owner), definition.name);
      addToMarket(ctx, card);
      return;
    case 'returnToHand': {
      const nextOwnTurn = work.activePlayer === owner ? work.turn + 2 : work.turn + 1;
      work.activeEffects.push({ kind: 'playCooldown', owner, card: card.id, expiresTurn: nextOwnTurn + 1 });
      appendEvent(work, 'effect', owner, `${definition.name} returned to hand`, { card: definition.name });
      addToHand(ctx, owner, card);
      return;
    }
    case 'giveToOpponent':
      appendEvent(work, 'effect', owner, `${definition.name} went to the opponent's hand`, { card: definition.name });
      addToHand(ctx, opponentOf(owner), card);
      return;
    case 'takeFromMarket':
      if (work.market.length > 0) {
        const index = expectIndex(
          requestChoice(ctx, {
            kind: 'marketPick',
            player: owner,
            source: definition.name,
            prompt: 'Choose a market card to take into your hand',
            options: indexOptions(work.market.length),
          }),
        );
        const taken = takeFromMarket(work, index);
        appendEvent(work, 'effect', owner, `${definition.name} took ${taken.name} from the market`, {
          card: definition.name,
        });
        addToHand(ctx, owner, taken);
      }
      addToMarket(ctx, card);
      return;
  }
};

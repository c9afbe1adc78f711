import { opponentOf, PLAYER_IDS } from './branded.js';
import { beginCenterTracking, settleCenter } from './center-trigger.js';
import { dispatchTrapEvent } from './effects-trap.js';
import { disposePushedCard, removeEdgeCard } from './effects-exit.js';
import { appendEvent } from './event-log.js';
import { horizonOf, roundOf } from './game-config.js';
import { addToHand } from './hand-limit.js';
import { enumerateDraws, enumeratePlays } from './legal-actions.js';
import { addToMarket, refillMarket, takeFromMarket } from './market.js';
import { stateInvariantError } from './runtime-error.js';
import type { StepContext } from './step-context.js';
import type { DrawChoice, GameDef, PlayAction } from './types.js';
import { ROW_CAPACITY, playerOf } from './zones.js';
import type { WorkingState } from './zones.js';

/** AwaitingPlay through UpdateMarket, with center evaluation after each row mutation. */
export const resolvePlayStep = (ctx: StepContext, action: PlayAction): void => {
  const { work } = ctx;
  const player = work.activePlayer;
  const hand = playerOf(work, player).hand;
  const [played] = hand.splice(action.handIndex, 1);
  if (played === undefined) {
    throw stateInvariantError(`hand index ${action.handIndex} out of range`);
  }

  beginCenterTracking(ctx);
  const card = { ...played, faceDown: action.faceDown };
  appendEvent(
    work,
    'play',
    player,
    action.faceDown ? `A card was played face down on the ${action.side}` : `${card.name} played on the ${action.side}`,
    action.faceDown ? {} : { card: card.name },
  );

  const outcome = dispatchTrapEvent(ctx, { kind: 'play', player, card });
  if (outcome.diverted) {
    addToMarket(ctx, card);
  } else {
    const row = playerOf(work, player).row;
    if (action.side === 'left') {
      row.unshift(card);
    } else {
      row.push(card);
    }
    if (row.length > ROW_CAPACITY) {
      // The center formed by the push settles before the pushed card moves on.
      const pushed = removeEdgeCard(ctx, player, action.side === 'left' ? 'right' : 'left');
      settleCenter(ctx);
      disposePushedCard(ctx, player, pushed);
    }
  }
  settleCenter(ctx);

  work.phase = 'draw';
  if (enumerateDraws(work).length === 0) {
    appendEvent(work, 'skip', player, 'No card can be drawn');
    completeTurn(ctx.def, work);
  }
};

/** AwaitingDraw through AdvanceTurn. */
export const resolveDrawStep = (ctx: StepContext, draw: DrawChoice): void => {
  const { work } = ctx;
  const player = work.activePlayer;

  if (draw.source === 'deck') {
    const card = work.deck.shift();
    if (card === undefined) {
      throw stateInvariantError('deck draw from an empty deck');
    }
    appendEvent(work, 'deckDraw', player, 'Drew from the deck');
    addToHand(ctx, player, card);
  } else {
    const card = takeFromMarket(work, draw.marketIndex);
    appendEvent(work, 'marketDraw', player, `Took ${card.name} from the market`, { card: card.name });
    const outcome = dispatchTrapEvent(ctx, { kind: 'marketDraw', player, card });
    addToHand(ctx, outcome.redirectTo ?? player, card);
  }

  refillMarket(work);
  completeTurn(ctx.def, work);
};

const scoreDelayedPayoffs = (work: WorkingState): void => {
  const finalRound = roundOf(work.turn);
  for (const player of PLAYER_IDS) {
    for (const card of playerOf(work, player).row) {
      const { markedTurn } = card.meta;
      if (card.faceDown || markedTurn === undefined) {
        continue;
      }
      const points = finalRound - roundOf(markedTurn);
      playerOf(work, player).score += points;
      appendEvent(work, 'delayedPayoff', player, `${card.name} scored ${points} for elapsed rounds`, {
        card: card.name,
        points,
      });
    }
  }
};

/** Increments the turn counter, or ends the game when it would pass the horizon. */
const advanceTurn = (def: GameDef, work: WorkingState): boolean => {
  if (work.turn + 1 > horizonOf(def)) {
    scoreDelayedPayoffs(work);
    work.phase = 'over';
    appendEvent(
      work,
      'gameOver',
      work.activePlayer,
      `Game over: ${work.players[0].score} to ${work.players[1].score}`,
    );
    return false;
  }

  work.turn += 1;
  work.activePlayer = opponentOf(work.activePlayer);
  work.phase = 'play';
  appendEvent(work, 'turn', work.activePlayer, `Turn ${work.turn} begins`);
  return true;
};

/**
 * Puts the active player into the first phase that has a legal input,
 * skipping whole turns when neither a play nor a draw exists.
 */
export const openTurn = (def: GameDef, work: WorkingState): void => {
  while (work.phase !== 'over') {
    if (enumeratePlays(def, work).length > 0) {
      work.phase = 'play';
      return;
    }
    appendEvent(work, 'skip', work.activePlayer, 'No card can be played');
    if (enumerateDraws(work).length > 0) {
      work.phase = 'draw';
      return;
    }
    appendEvent(work, 'skip', work.activePlayer, 'No card can be drawn');
    advanceTurn(def, work);
  }
};

export const completeTurn = (def: GameDef, work: WorkingState): void => {
  if (advanceTurn(def, work)) {
    openTurn(def, work);
  }
};

import { DecisionSource, findOfferedOption, PendingChoiceSignal } from './decisions.js';
import { getCardDefinition } from './card-catalog.js';
import { illegalActionError, protocolViolationError } from './runtime-error.js';
import type { ErrorSurface } from './runtime-error.js';
import { ILLEGAL_ACTION_REASONS, PROTOCOL_VIOLATION_REASONS } from './runtime-reasons.js';
import type { StepContext } from './step-context.js';
import { resolveDrawStep, resolvePlayStep } from './turn-steps.js';
import type { ChoiceOption, ChoiceRequest, ChoiceView, DrawChoice, GameDef, GameState, PendingStep, PlayAction } from './types.js';
import { choiceViewOf, fromWorkingState, isMarketLocked, isOnCooldown, playerOf, toWorkingState } from './zones.js';

const assertPhase = (state: GameState, surface: ErrorSurface, phase: 'play' | 'draw'): void => {
  if (state.pending !== null) {
    throw protocolViolationError(surface, PROTOCOL_VIOLATION_REASONS.CHOICE_PENDING, undefined, state.pending.request.kind);
  }
  if (state.phase === 'over') {
    throw illegalActionError(surface, ILLEGAL_ACTION_REASONS.GAME_OVER);
  }
  if (state.phase !== phase) {
    throw illegalActionError(surface, ILLEGAL_ACTION_REASONS.WRONG_PHASE, { phase: state.phase });
  }
};

const validatePlay = (def: GameDef, state: GameState, action: PlayAction): void => {
  assertPhase(state, 'applyAction', 'play');
  const hand = playerOf(state, state.activePlayer).hand;
  const card = Number.isSafeInteger(action.handIndex) ? hand[action.handIndex] : undefined;
  if (card === undefined) {
    throw illegalActionError('applyAction', ILLEGAL_ACTION_REASONS.HAND_INDEX_OUT_OF_RANGE, {
      handIndex: action.handIndex,
      handSize: hand.length,
    });
  }
  if (action.side !== 'left' && action.side !== 'right') {
    throw illegalActionError('applyAction', ILLEGAL_ACTION_REASONS.INVALID_SIDE, { side: action.side });
  }
  if (action.faceDown && getCardDefinition(def.catalog, card.name).category !== 'trap') {
    throw illegalActionError('applyAction', ILLEGAL_ACTION_REASONS.FACE_DOWN_NOT_TRAP, { card: card.name });
  }
  if (isOnCooldown(state, state.activePlayer, card.id)) {
    throw illegalActionError('applyAction', ILLEGAL_ACTION_REASONS.CARD_ON_COOLDOWN, { card: card.name });
  }
};

const validateDraw = (state: GameState, draw: DrawChoice): void => {
  assertPhase(state, 'applyDraw', 'draw');
  if (draw.source === 'deck') {
    if (state.deck.length === 0) {
      throw illegalActionError('applyDraw', ILLEGAL_ACTION_REASONS.DECK_EMPTY);
    }
    return;
  }
  if (isMarketLocked(state, state.activePlayer)) {
    throw illegalActionError('applyDraw', ILLEGAL_ACTION_REASONS.MARKET_LOCKED);
  }
  if (!Number.isSafeInteger(draw.marketIndex) || state.market[draw.marketIndex] === undefined) {
    throw illegalActionError('applyDraw', ILLEGAL_ACTION_REASONS.MARKET_INDEX_OUT_OF_RANGE, {
      marketIndex: draw.marketIndex,
      marketSize: state.market.length,
    });
  }
};

/**
 * Replays a step from its base state with the given decisions. Running out
 * of decisions returns the base state carrying the outstanding request; the
 * visible zones stay as they were before the step began; the request carries
 * a view of the mid-step zones its options point into.
 */
const runStep = (def: GameDef, base: GameState, step: PendingStep, decisions: readonly ChoiceOption[]): GameState => {
  const source = new DecisionSource(decisions);
  const ctx: StepContext = {
    def,
    work: toWorkingState(base),
    decisions: source,
    creditedCenter: null,
    centerTriggers: 0,
  };

  try {
    if (step.kind === 'play') {
      resolvePlayStep(ctx, step.action);
    } else {
      resolveDrawStep(ctx, step.draw);
    }
  } catch (error) {
    if (error instanceof PendingChoiceSignal) {
      return { ...base, pending: { step, decisions, request: error.request, view: choiceViewOf(ctx.work) } };
    }
    throw error;
  }

  source.assertExhausted();
  return fromWorkingState(ctx.work);
};

export const applyAction = (def: GameDef, state: GameState, action: PlayAction): GameState => {
  validatePlay(def, state, action);
  return runStep(def, state, { kind: 'play', action }, []);
};

export const applyDraw = (def: GameDef, state: GameState, draw: DrawChoice): GameState => {
  validateDraw(state, draw);
  return runStep(def, state, { kind: 'draw', draw }, []);
};

/** Answers the outstanding request with one of its offered options. */
export const resolveChoice = (def: GameDef, state: GameState, option: ChoiceOption): GameState => {
  const { pending } = state;
  if (pending === null) {
    throw protocolViolationError('resolveChoice', PROTOCOL_VIOLATION_REASONS.NO_CHOICE_PENDING, option);
  }
  const offered = findOfferedOption(pending.request, option);
  if (offered === undefined) {
    throw protocolViolationError(
      'resolveChoice',
      PROTOCOL_VIOLATION_REASONS.OPTION_NOT_OFFERED,
      option,
      pending.request.kind,
    );
  }
  return runStep(def, { ...state, pending: null }, pending.step, [...pending.decisions, offered]);
};

export const currentChoiceRequest = (state: GameState): ChoiceRequest | null => state.pending?.request ?? null;

/** The mid-step zones the outstanding request's options refer to. */
export const currentChoiceView = (state: GameState): ChoiceView | null => state.pending?.view ?? null;

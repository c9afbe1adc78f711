import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  ALL_ICONS,
  applyAction,
  applyDraw,
  currentChoiceRequest,
  effectiveIcons,
  eventsOfKind,
  isMarketLocked,
  legalDraws,
  resolveChoice,
  type CardInstance,
  type GameState,
  type PlayAction,
} from '../../../src/kernel/index.js';
import {
  buildState,
  card,
  hidden,
  ids,
  index,
  names,
  P0,
  P1,
  resolveAll,
  side,
  SKIP,
  slot,
  testDef,
  type PlayerSetup,
} from '../../helpers/state-builders.js';

const def = testDef();
const PLAY_RIGHT: PlayAction = { handIndex: 0, side: 'right', faceDown: false };

interface CenterSetup {
  readonly left?: CardInstance;
  readonly played?: CardInstance;
  readonly p1?: PlayerSetup;
  readonly market?: readonly CardInstance[];
  readonly turn?: number;
}

/** Plays a card to the right of `[left, center]`, which puts `center` in the middle of a full row. */
const centerPlay = (center: CardInstance, setup: CenterSetup = {}): GameState =>
  applyAction(
    def,
    buildState({
      p0: { row: [setup.left ?? card('Farewell Unit'), center], hand: [setup.played ?? card('Sacrificial Lamb')] },
      ...(setup.p1 === undefined ? {} : { p1: setup.p1 }),
      ...(setup.market === undefined ? {} : { market: setup.market }),
      ...(setup.turn === undefined ? {} : { turn: setup.turn }),
    }),
    PLAY_RIGHT,
  );

const scores = (state: GameState): readonly number[] => state.players.map((player) => player.score);

describe('center effects', () => {
  it('Calibration Unit scores 2', () => {
    assert.deepEqual(scores(centerPlay(card('Calibration Unit'))), [2, 0]);
  });

  it('Loner Bot scores 4 only without a shared neighbour icon', () => {
    assert.equal(centerPlay(card('Loner Bot')).players[0].score, 4);

    const shared = centerPlay(card('Loner Bot'), { left: card('Sequence Bot') });
    assert.equal(shared.players[0].score, 0);
    assert.equal(shared.players[0].row[1]?.meta.lastCenterScore, 0);
  });

  it("Copycat scores the lower of its neighbours' last center scores", () => {
    const state = centerPlay(card('Copycat'), {
      left: card('Calibration Unit', { meta: { lastCenterScore: 4 } }),
      played: card('Kickback', { meta: { lastCenterScore: 3 } }),
    });
    assert.equal(state.players[0].score, 3);
  });

  it('Siphon Drone scores 3 and gives the opponent 2', () => {
    assert.deepEqual(scores(centerPlay(card('Siphon Drone'))), [3, 2]);
  });

  it("Jealous Unit scores 2 per opponent card sharing its icon", () => {
    const state = centerPlay(card('Jealous Unit'), {
      p1: { row: [card('Farewell Unit', { id: 'p1-fu' }), card('Void', { id: 'p1-void' }), card('Buddy System', { id: 'p1-bs' })] },
    });
    assert.equal(state.players[0].score, 4);
  });

  it('Sequence Bot scores 3 for exactly three icons and 1 otherwise', () => {
    assert.equal(centerPlay(card('Sequence Bot'), { left: card('Calibration Unit'), played: card('Kickback') }).players[0].score, 3);
    assert.equal(centerPlay(card('Sequence Bot'), { left: card('Calibration Unit'), played: card('Embargo') }).players[0].score, 1);
  });

  it('Patience Circuit marks the current turn and scores nothing now', () => {
    const state = centerPlay(card('Patience Circuit'), { turn: 5 });

    assert.equal(state.players[0].score, 0);
    assert.equal(state.players[0].row[1]?.meta.markedTurn, 5);
    assert.deepEqual(
      eventsOfKind(state.log, 'effect').map((event) => event.message),
      ['Patience Circuit marked round 3'],
    );
  });

  it('Void scores 2 per empty slot across both rows', () => {
    const state = centerPlay(card('Void'), { p1: { row: [card('Copycat', { id: 'p1-copycat' })] } });
    assert.equal(state.players[0].score, 4);
  });

  it('Buddy System scores nothing once the row is full', () => {
    assert.equal(centerPlay(card('Buddy System')).players[0].score, 0);
  });

  it("Mimic takes its left neighbour's icon and scores 2", () => {
    const state = centerPlay(card('Mimic'), { left: card('Kickback') });
    const mimic = state.players[0].row[1];

    assert.equal(state.players[0].score, 2);
    assert.ok(mimic !== undefined);
    assert.deepEqual(effectiveIcons(def, mimic), ['spark']);
  });

  it('Hollow Frame scores 0 and shows every icon', () => {
    const state = centerPlay(card('Hollow Frame'));
    const frame = state.players[0].row[1];

    assert.equal(state.players[0].score, 0);
    assert.ok(frame !== undefined);
    assert.deepEqual(effectiveIcons(def, frame), ALL_ICONS);
  });

  it('Echo Chamber scores nothing in odd rounds and resolves twice in even rounds', () => {
    const odd = centerPlay(card('Echo Chamber'), { turn: 1 });
    assert.equal(odd.players[0].score, 0);
    assert.equal(odd.players[0].row[1]?.meta.lastCenterScore, 0);

    const even = centerPlay(card('Echo Chamber'), { turn: 3 });
    assert.equal(even.players[0].score, 4);
    assert.equal(eventsOfKind(even.log, 'centerScored').length, 2);
    assert.equal(even.players[0].row[1]?.meta.lastCenterScore, 4);
  });

  it('One-Shot scores 5 and leaves the game', () => {
    const state = centerPlay(card('One-Shot'));

    assert.equal(state.players[0].score, 5);
    assert.deepEqual(ids(state.removed), ['one-shot']);
    assert.deepEqual(ids(state.players[0].row), ['farewell-unit', 'sacrificial-lamb']);
  });

  it('Hot Potato scores 2 and moves to the opponent hand', () => {
    const state = centerPlay(card('Hot Potato'), { left: card('Calibration Unit'), played: card('Void') });

    assert.equal(state.players[0].score, 2);
    assert.deepEqual(ids(state.players[1].hand), ['hot-potato']);
    assert.deepEqual(ids(state.players[0].row), ['calibration-unit', 'void']);
  });

  it('Hot Potato cannot be the discard when the opponent hand overflows', () => {
    const pending = centerPlay(card('Hot Potato'), {
      left: card('Calibration Unit'),
      played: card('Void'),
      p1: { hand: [card('Copycat', { id: 'p1-copycat' }), card('Loner Bot', { id: 'p1-loner' })] },
    });
    const request = currentChoiceRequest(pending);

    assert.equal(request?.kind, 'discard');
    assert.equal(request?.player, P1);
    assert.deepEqual(request?.options, [index(0), index(1)]);

    const after = resolveChoice(def, pending, index(0));
    assert.deepEqual(ids(after.players[1].hand), ['p1-loner', 'hot-potato']);
    assert.deepEqual(ids(after.trash), ['p1-copycat']);
  });
});

describe('center effects with choices', () => {
  it('Turncoat swaps into the opponent row and the incoming card fires', () => {
    const pending = centerPlay(card('Turncoat'), {
      left: card('Calibration Unit'),
      played: card('Void'),
      p1: { row: [card('Farewell Unit', { id: 'p1-fu' }), card('Sequence Bot', { id: 'p1-sb' })] },
    });
    assert.equal(currentChoiceRequest(pending)?.kind, 'swapTarget');
    assert.deepEqual(currentChoiceRequest(pending)?.options, [slot(1, 0), slot(1, 1)]);

    const after = resolveChoice(def, pending, slot(1, 1));
    assert.deepEqual(names(after.players[0].row), ['Calibration Unit', 'Sequence Bot', 'Void']);
    assert.deepEqual(names(after.players[1].row), ['Farewell Unit', 'Turncoat']);
    // Turncoat 2, then Sequence Bot with two icons shown scores 1.
    assert.equal(after.players[0].score, 3);
  });

  it('Turncoat never targets a face-up Turncoat and skips the choice on an empty row', () => {
    const guarded = centerPlay(card('Turncoat'), {
      p1: { row: [card('Turncoat', { id: 'p1-tc' }), card('Void', { id: 'p1-void' })] },
    });
    assert.deepEqual(currentChoiceRequest(guarded)?.options, [slot(1, 1)]);

    const alone = centerPlay(card('Turncoat'));
    assert.equal(alone.pending, null);
    assert.equal(alone.players[0].score, 2);
  });

  it('Tug-of-War makes a full opponent row push an edge card of their choice', () => {
    const pending = centerPlay(card('Tug-of-War'), {
      p1: {
        row: [
          card('Farewell Unit', { id: 'p1-fu' }),
          card('Void', { id: 'p1-void' }),
          card('Copycat', { id: 'p1-copycat' }),
        ],
      },
    });
    const request = currentChoiceRequest(pending);
    assert.equal(request?.kind, 'edgePush');
    assert.equal(request?.player, P1);

    const after = resolveChoice(def, pending, side('left'));
    assert.deepEqual(ids(after.players[1].row), ['p1-void', 'p1-copycat']);
    assert.deepEqual(ids(after.market), ['p1-fu']);
    assert.deepEqual(scores(after), [1, 3]);
  });

  it('Tug-of-War asks nothing when the opponent row is not full', () => {
    const state = centerPlay(card('Tug-of-War'), { p1: { row: [card('Void', { id: 'p1-void' })] } });
    assert.equal(state.pending, null);
    assert.deepEqual(scores(state), [1, 0]);
  });

  it('Scavenger may swap with a face-down card or skip', () => {
    const setup: CenterSetup = { left: hidden('Tripwire'), played: card('Void') };
    const pending = centerPlay(card('Scavenger'), setup);
    assert.equal(currentChoiceRequest(pending)?.kind, 'scavengeTarget');
    assert.deepEqual(currentChoiceRequest(pending)?.options, [SKIP, slot(0, 0)]);

    const swapped = resolveChoice(def, pending, slot(0, 0));
    assert.deepEqual(ids(swapped.players[0].row), ['scavenger', 'tripwire', 'void']);
    assert.equal(swapped.players[0].row[1]?.faceDown, true);

    const skipped = resolveChoice(def, pending, SKIP);
    assert.deepEqual(ids(skipped.players[0].row), ['tripwire', 'scavenger', 'void']);
  });

  it('Magnet pulls a market card into the chosen side and pushes that neighbour out', () => {
    const pending = centerPlay(card('Magnet'), {
      left: card('Calibration Unit'),
      played: card('Farewell Unit'),
      market: [card('Void', { id: 'm-void' }), card('Copycat', { id: 'm-copycat' })],
    });
    assert.equal(currentChoiceRequest(pending)?.kind, 'marketPick');

    const placing = resolveChoice(def, pending, index(0));
    assert.equal(currentChoiceRequest(placing)?.kind, 'placementSide');
    assert.deepEqual(currentChoiceRequest(placing)?.options, [side('left'), side('right')]);

    const after = resolveChoice(def, placing, side('right'));
    assert.deepEqual(ids(after.players[0].row), ['calibration-unit', 'magnet', 'm-void']);
    assert.deepEqual(ids(after.market), ['m-copycat', 'farewell-unit']);
    // Magnet 1, then Farewell Unit 3 on exit.
    assert.equal(after.players[0].score, 4);
  });

  it('Magnet with an empty market only scores', () => {
    const state = centerPlay(card('Magnet'));
    assert.equal(state.pending, null);
    assert.equal(state.players[0].score, 1);
  });
});

describe('Embargo', () => {
  it("locks the opponent's market for exactly their next turn", () => {
    const deck = ['d1', 'd2', 'd3', 'd4', 'd5', 'd6'].map((id) => card('Void', { id }));
    const start = buildState({
      p0: { row: [card('Calibration Unit'), card('Embargo')], hand: [card('Void')] },
      p1: { hand: [card('Copycat', { id: 'p1-copycat' })] },
      deck,
    });

    const played = applyAction(def, start, PLAY_RIGHT);
    assert.equal(played.players[0].score, 1);
    assert.deepEqual(played.activeEffects, [{ kind: 'marketLock', owner: P0, source: 'embargo', expiresTurn: 3 }]);
    assert.equal(isMarketLocked(played, P0), false);

    const opponentTurn = applyDraw(def, played, { source: 'deck' });
    assert.equal(opponentTurn.turn, 2);
    assert.equal(isMarketLocked(opponentTurn, P1), true);

    const opponentDraw = applyAction(def, opponentTurn, { handIndex: 0, side: 'left', faceDown: false });
    assert.deepEqual(legalDraws(opponentDraw), [{ source: 'deck' }]);
    assert.throws(() => applyDraw(def, opponentDraw, { source: 'market', marketIndex: 0 }));

    const nextTurn = applyDraw(def, opponentDraw, { source: 'deck' });
    assert.equal(nextTurn.turn, 3);
    assert.equal(isMarketLocked(nextTurn, P1), false);
  });
});

describe('center resolution order', () => {
  it('credits the points before the positional part of the effect', () => {
    const state = resolveAll(
      def,
      centerPlay(card('Kickback'), { left: card('Calibration Unit'), played: card('Farewell Unit') }),
      [side('right')],
    );

    assert.deepEqual(
      state.log.filter((event) => event.kind === 'centerScored' || event.kind === 'exitScored').map((event) => event.kind),
      ['centerScored', 'exitScored'],
    );
  });
});

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { applyAction, applyDraw, eventsOfKind } from '../../../src/kernel/index.js';
import { buildState, card, ids, P1, testDef } from '../../helpers/state-builders.js';

const def = testDef();
const market = [card('Calibration Unit', { id: 'm0' }), card('Echo Chamber', { id: 'm1' }), card('One-Shot', { id: 'm2' })];

describe('draw step', () => {
  it('draws the deck head and passes the turn', () => {
    const state = applyDraw(
      def,
      buildState({ p0: { hand: [card('Void', { id: 'h-void' })] }, p1: { hand: [card('Copycat', { id: 'p1-copycat' })] }, market, phase: 'draw' }),
      { source: 'deck' },
    );

    assert.deepEqual(ids(state.players[0].hand), ['h-void', 'deck-void']);
    assert.deepEqual(ids(state.deck), ['deck-copycat', 'deck-hot-potato']);
    assert.deepEqual(ids(state.market), ['m0', 'm1', 'm2']);
    assert.equal(state.turn, 2);
    assert.equal(state.activePlayer, P1);
    assert.equal(state.phase, 'play');
  });

  it('refills the market from the deck head after a market draw', () => {
    const state = applyDraw(
      def,
      buildState({ p1: { hand: [card('Copycat', { id: 'p1-copycat' })] }, market, phase: 'draw' }),
      { source: 'market', marketIndex: 1 },
    );

    assert.deepEqual(ids(state.players[0].hand), ['m1']);
    assert.deepEqual(ids(state.market), ['m0', 'm2', 'deck-void']);
    assert.deepEqual(ids(state.deck), ['deck-copycat', 'deck-hot-potato']);
    assert.deepEqual(
      eventsOfKind(state.log, 'refill').map((event) => event.card),
      ['Void'],
    );
  });

  it('skips the draw when neither the deck nor the market has a card', () => {
    const state = applyAction(
      def,
      buildState({ p0: { hand: [card('Void')] }, p1: { hand: [card('Copycat', { id: 'p1-copycat' })] }, deck: [] }),
      { handIndex: 0, side: 'left', faceDown: false },
    );

    assert.equal(state.turn, 2);
    assert.equal(state.activePlayer, P1);
    assert.deepEqual(
      eventsOfKind(state.log, 'skip').map((event) => event.message),
      ['No card can be drawn'],
    );
  });

  it('opens the next turn in the draw phase when there is nothing to play', () => {
    const state = applyDraw(def, buildState({ market, phase: 'draw' }), { source: 'deck' });

    assert.equal(state.activePlayer, P1);
    assert.equal(state.phase, 'draw');
  });

  it('skips a whole turn with nothing to play or draw', () => {
    const state = applyDraw(def, buildState({ deck: [card('Void', { id: 'last' })], phase: 'draw' }), { source: 'deck' });

    assert.equal(state.turn, 3);
    assert.equal(state.activePlayer, 0);
    assert.equal(state.phase, 'play');
    assert.deepEqual(
      state.log.map((event) => event.kind),
      ['deckDraw', 'turn', 'skip', 'skip', 'turn'],
    );
  });
});

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  allCardInstances,
  createCardInstances,
  createInitialState,
  createRng,
  shuffle,
} from '../../../src/kernel/index.js';
import { ids, names, testDef } from '../../helpers/state-builders.js';

describe('createInitialState', () => {
  it('deals two cards to each player alternately and lays out the market', () => {
    const def = testDef();
    const state = createInitialState(def, 7);
    const [shuffled] = shuffle(createCardInstances(def), createRng(7n));
    const order = ids(shuffled);

    assert.deepEqual(ids(state.players[0].hand), [order[0], order[2]]);
    assert.deepEqual(ids(state.players[1].hand), [order[1], order[3]]);
    assert.deepEqual(ids(state.market), order.slice(4, 7));
    assert.deepEqual(ids(state.deck), order.slice(7));
  });

  it('starts turn 1 with player 0 to play and nothing pending', () => {
    const state = createInitialState(testDef(), 7);

    assert.equal(state.turn, 1);
    assert.equal(state.activePlayer, 0);
    assert.equal(state.phase, 'play');
    assert.equal(state.pending, null);
    assert.deepEqual(state.players.map((player) => [player.row.length, player.score]), [
      [0, 0],
      [0, 0],
    ]);
    assert.deepEqual(
      state.log.map((event) => event.kind),
      ['deal', 'deal', 'refill', 'refill', 'refill'],
    );
    assert.equal(state.log[0]?.message, 'Dealt 2 cards');
  });

  it('holds every catalog card exactly once', () => {
    const state = createInitialState(testDef(), 12);
    const expected = Array.from({ length: 30 }, (_, index) => `card-${index}`).sort();

    assert.deepEqual([...ids(allCardInstances(state))].sort(), expected);
  });

  it('is deterministic per seed', () => {
    const def = testDef();
    assert.deepEqual(createInitialState(def, 3), createInitialState(def, 3));
    assert.notDeepEqual(ids(createInitialState(def, 3).deck), ids(createInitialState(def, 4).deck));
  });

  it('deals what a short configured deck allows', () => {
    const def = testDef({ deck: ['Void', 'Void', 'Farewell Unit'] });
    const state = createInitialState(def, 1);

    assert.deepEqual(names(createCardInstances(def)), ['Void', 'Void', 'Farewell Unit']);
    assert.equal(state.players[0].hand.length, 2);
    assert.equal(state.players[1].hand.length, 1);
    assert.deepEqual(state.market, []);
    assert.deepEqual(state.deck, []);
  });

  it('rejects seeds that are not safe integers', () => {
    assert.throws(() => createInitialState(testDef(), 1.5), RangeError);
  });
});

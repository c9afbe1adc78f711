import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { evaluateState, positionPotential } from '../../../src/agents/evaluate-state.js';
import { buildState, card, hidden, P0, P1, testDef } from '../../helpers/state-builders.js';

const def = testDef();

describe('positionPotential', () => {
  it('weights held cards by catalog value', () => {
    assert.equal(positionPotential(def, { hand: [card('Calibration Unit')], row: [], score: 0 }), 30);
  });

  it('counts hidden traps, exposed exits and a row one card short of a center', () => {
    const row = [hidden('Tripwire'), card('Farewell Unit')];
    assert.equal(positionPotential(def, { hand: [], row, score: 0 }), 30 + 50 + 15);
  });

  it('values a marked delayed payoff by the rounds left to run', () => {
    const row = [card('Patience Circuit', { meta: { markedTurn: 3 } })];
    assert.equal(positionPotential(def, { hand: [], row, score: 0 }), 8 * 50);
  });
});

describe('evaluateState', () => {
  it('weights the score differential for an unfinished game', () => {
    const state = buildState({ p0: { score: 3 }, p1: { score: 1 } });
    assert.equal(evaluateState(def, state, P0), 200);
    assert.equal(evaluateState(def, state, P1), -200);
  });

  it('adds the win and loss bonus once the game is over', () => {
    const state = buildState({ p0: { score: 3 }, p1: { score: 1 }, phase: 'over' });
    assert.equal(evaluateState(def, state, P0), 1_000_200);
    assert.equal(evaluateState(def, state, P1), -1_000_200);
  });

  it('scores a finished tie at zero', () => {
    const state = buildState({ p0: { score: 2 }, p1: { score: 2 }, phase: 'over' });
    assert.equal(evaluateState(def, state, P0), 0);
  });
});

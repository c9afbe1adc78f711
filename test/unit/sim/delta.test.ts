import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { applyAction, resolveChoice } from '../../../src/kernel/index.js';
import { computeDeltas } from '../../../src/sim/delta.js';
import { buildState, card, P1, side, testDef } from '../../helpers/state-builders.js';

const def = testDef();
const before = buildState({
  p0: { hand: [card('Farewell Unit')], row: [card('Calibration Unit'), card('Kickback')] },
});

describe('computeDeltas', () => {
  it('returns no deltas for identical states', () => {
    assert.deepEqual(computeDeltas(before, before), []);
  });

  it('reports only the outstanding request while a step is suspended', () => {
    const pending = applyAction(def, before, { handIndex: 0, side: 'right', faceDown: false });
    assert.deepEqual(computeDeltas(before, pending), [{ path: 'pending', before: null, after: 'pushDirection' }]);
  });

  it('reports scores and zones by card id in sorted path order', () => {
    const pending = applyAction(def, before, { handIndex: 0, side: 'right', faceDown: false });
    const after = resolveChoice(def, pending, side('right'));

    assert.deepEqual(computeDeltas(before, after), [
      { path: 'market', before: [], after: ['farewell-unit'] },
      { path: 'phase', before: 'play', after: 'draw' },
      { path: 'players.0.hand', before: ['farewell-unit'], after: [] },
      { path: 'players.0.score', before: 0, after: 5 },
    ]);
  });

  it('reports turn bookkeeping', () => {
    const next = { ...before, turn: 2, activePlayer: P1 };
    assert.deepEqual(
      computeDeltas(before, next).map((delta) => delta.path),
      ['activePlayer', 'turn'],
    );
  });
});

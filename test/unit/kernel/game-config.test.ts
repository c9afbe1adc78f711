import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  CatalogIntegrityError,
  createGameDef,
  defaultCardCatalog,
  horizonOf,
  isKernelErrorCode,
  parseGameConfig,
  roundOf,
} from '../../../src/kernel/index.js';

describe('game config', () => {
  it('applies defaults', () => {
    assert.deepEqual(parseGameConfig(), { turnsPerPlayer: 10, maxCenterTriggersPerTurn: 32 });
  });

  it('keeps a configured deck with duplicates', () => {
    const config = parseGameConfig({ turnsPerPlayer: 4, deck: ['Void', 'Void'] });
    assert.deepEqual(config, { turnsPerPlayer: 4, maxCenterTriggersPerTurn: 32, deck: ['Void', 'Void'] });
  });

  it('rejects out-of-range values with schema issues', () => {
    assert.throws(
      () => parseGameConfig({ turnsPerPlayer: 0 }),
      (error: unknown) =>
        isKernelErrorCode(error, 'GAME_CONFIG_INVALID')
        && error.context?.issues[0]?.startsWith('turnsPerPlayer:') === true,
    );
    assert.throws(
      () => parseGameConfig({ maxCenterTriggersPerTurn: 0 }),
      (error: unknown) => isKernelErrorCode(error, 'GAME_CONFIG_INVALID'),
    );
  });

  it('rejects deck names missing from the catalog', () => {
    assert.throws(
      () => createGameDef(defaultCardCatalog(), { deck: ['Void', 'Nope'] }),
      (error: unknown) =>
        error instanceof CatalogIntegrityError
        && error.reason === 'unknownName'
        && JSON.stringify(error.context?.names) === JSON.stringify(['Nope']),
    );
  });

  it('derives the horizon and rounds from player turns', () => {
    assert.equal(horizonOf(createGameDef(defaultCardCatalog(), { turnsPerPlayer: 3 })), 6);
    assert.deepEqual([1, 2, 3, 4, 20].map(roundOf), [1, 1, 2, 2, 10]);
  });
});

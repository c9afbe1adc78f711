import { asCardName } from './branded.js';
import { formatIssues } from './card-catalog.js';
import { catalogIntegrityError, kernelRuntimeError } from './runtime-error.js';
import { CATALOG_INTEGRITY_REASONS } from './runtime-reasons.js';
import { GameConfigSchema } from './schemas.js';
import type { GameConfigInput } from './schemas.js';
import type { CardCatalog, GameConfig, GameDef } from './types.js';

export const DEFAULT_GAME_CONFIG: GameConfig = Object.freeze({
  turnsPerPlayer: 10,
  maxCenterTriggersPerTurn: 32,
});

export const parseGameConfig = (input: GameConfigInput = {}): GameConfig => {
  const parsed = GameConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw kernelRuntimeError(
      'GAME_CONFIG_INVALID',
      'game config failed schema validation',
      { issues: formatIssues(parsed.error.issues) },
      parsed.error,
    );
  }

  const { turnsPerPlayer, deck, maxCenterTriggersPerTurn } = parsed.data;
  return Object.freeze({
    turnsPerPlayer,
    maxCenterTriggersPerTurn,
    ...(deck === undefined ? {} : { deck: Object.freeze([...deck]) }),
  });
};

/** Binds a catalog to a validated config; every configured deck entry must name a catalog card. */
export const createGameDef = (catalog: CardCatalog, configInput: GameConfigInput = {}): GameDef => {
  const config = parseGameConfig(configInput);
  if (config.deck !== undefined) {
    const unknown = config.deck.filter((name) => !catalog.byName.has(asCardName(name)));
    if (unknown.length > 0) {
      throw catalogIntegrityError(`deck names cards missing from the catalog: ${unknown.join(', ')}`, {
        reason: CATALOG_INTEGRITY_REASONS.UNKNOWN_NAME,
        names: unknown,
      });
    }
  }
  return Object.freeze({ catalog, config });
};

export const horizonOf = (def: GameDef): number => def.config.turnsPerPlayer * 2;

/** Rounds count both seats' turns together: turns 1 and 2 are round 1. */
export const roundOf = (turn: number): number => Math.ceil(turn / 2);

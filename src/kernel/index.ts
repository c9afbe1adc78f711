export * from './branded.js';
export * from './types.js';
export * from './schemas.js';
export * from './prng.js';
export * from './runtime-reasons.js';
export * from './runtime-error.js';
export * from './card-catalog.js';
export * from './game-config.js';
export { allCardInstances, centerOf, effectiveIcons, isEffectLive, isMarketLocked, isOnCooldown, playerOf } from './zones.js';
export { HAND_LIMIT, MARKET_CAPACITY, ROW_CAPACITY } from './zones.js';
export { eventsOfKind } from './event-log.js';
export { indexOptions, isOfferedOption, optionKey, sideOptions } from './decisions.js';
export * from './legal-actions.js';
export * from './apply-action.js';
export { createCardInstances, createInitialState } from './initial-state.js';
export * from './terminal.js';

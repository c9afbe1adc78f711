export const ILLEGAL_ACTION_REASONS = {
  GAME_OVER: 'gameOver',
  WRONG_PHASE: 'wrongPhase',
  HAND_INDEX_OUT_OF_RANGE: 'handIndexOutOfRange',
  INVALID_SIDE: 'invalidSide',
  FACE_DOWN_NOT_TRAP: 'faceDownNotTrap',
  CARD_ON_COOLDOWN: 'cardOnCooldown',
  DECK_EMPTY: 'deckEmpty',
  MARKET_LOCKED: 'marketLocked',
  MARKET_INDEX_OUT_OF_RANGE: 'marketIndexOutOfRange',
} as const;

export type IllegalActionReason = (typeof ILLEGAL_ACTION_REASONS)[keyof typeof ILLEGAL_ACTION_REASONS];

export const ILLEGAL_ACTION_REASON_MESSAGES: Readonly<Record<IllegalActionReason, string>> = {
  gameOver: 'the game is over',
  wrongPhase: 'the action does not belong to the current phase',
  handIndexOutOfRange: 'no card at that hand index',
  invalidSide: 'side must be left or right',
  faceDownNotTrap: 'only trap cards may be played face down',
  cardOnCooldown: 'the card cannot be played this turn',
  deckEmpty: 'the deck is empty',
  marketLocked: 'the market is locked for this player',
  marketIndexOutOfRange: 'no card at that market index',
};

export const PROTOCOL_VIOLATION_REASONS = {
  CHOICE_PENDING: 'choicePending',
  NO_CHOICE_PENDING: 'noChoicePending',
  OPTION_NOT_OFFERED: 'optionNotOffered',
} as const;

export type ProtocolViolationReason = (typeof PROTOCOL_VIOLATION_REASONS)[keyof typeof PROTOCOL_VIOLATION_REASONS];

export const PROTOCOL_VIOLATION_REASON_MESSAGES: Readonly<Record<ProtocolViolationReason, string>> = {
  choicePending: 'a choice must be resolved first',
  noChoicePending: 'no choice has been requested',
  optionNotOffered: 'the option is not in the offered set',
};

export const CATALOG_INTEGRITY_REASONS = {
  SCHEMA_INVALID: 'schemaInvalid',
  DUPLICATE_NAME: 'duplicateName',
  UNKNOWN_NAME: 'unknownName',
  EMPTY_CATALOG: 'emptyCatalog',
} as const;

export type CatalogIntegrityReason = (typeof CATALOG_INTEGRITY_REASONS)[keyof typeof CATALOG_INTEGRITY_REASONS];

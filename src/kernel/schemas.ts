import { z } from 'zod';

export const StringSchema = z.string().min(1);
export const PointsSchema = z.number().int().min(0);

export const IconSchema = z.union([z.literal('gear'), z.literal('spark'), z.literal('chip'), z.literal('heart')]);

export const RoundParitySchema = z.union([z.literal('even'), z.literal('odd')]);

export const CenterEffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('score'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('parityScore'), roundParity: RoundParitySchema, points: PointsSchema }).strict(),
  z.object({ kind: z.literal('lonerBonus'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('copyNeighbours') }).strict(),
  z.object({ kind: z.literal('siphon'), points: PointsSchema, opponentPoints: PointsSchema }).strict(),
  z.object({ kind: z.literal('sharedIconsWithOpponent'), pointsPerCard: PointsSchema }).strict(),
  z
    .object({
      kind: z.literal('iconVariety'),
      distinct: z.number().int().min(1).max(4),
      points: PointsSchema,
      fallbackPoints: PointsSchema,
    })
    .strict(),
  z.object({ kind: z.literal('selfPush'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('markTurn') }).strict(),
  z.object({ kind: z.literal('swapWithOpponent'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('emptySlots'), pointsPerSlot: PointsSchema }).strict(),
  z.object({ kind: z.literal('rowSize'), size: z.number().int().min(0).max(3), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('mimicLeft'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('forceOpponentPush'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('allIcons'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('selfRemove'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('marketLock'), points: PointsSchema, opponentTurns: z.number().int().min(1) }).strict(),
  z.object({ kind: z.literal('scavenge') }).strict(),
  z.object({ kind: z.literal('magnet'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('giveToOpponent'), points: PointsSchema }).strict(),
]);

export const ExitEffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('score'), points: PointsSchema }).strict(),
  z.object({ kind: z.literal('forceOpponentPush') }).strict(),
  z.object({ kind: z.literal('returnToHand') }).strict(),
  z.object({ kind: z.literal('giveToOpponent') }).strict(),
  z.object({ kind: z.literal('takeFromMarket') }).strict(),
]);

export const TrapTriggerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('opponentCenterScore') }).strict(),
  z.object({ kind: z.literal('opponentMarketDraw') }).strict(),
  z.object({ kind: z.literal('opponentPlaysCenterIcon') }).strict(),
]);

export const TrapEffectSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('cancelScore'), ownerPoints: PointsSchema }).strict(),
  z.object({ kind: z.literal('redirectDraw') }).strict(),
  z.object({ kind: z.literal('divertPlay') }).strict(),
  z.object({ kind: z.literal('mirrorScore') }).strict(),
]);

const CardCommonShape = {
  name: StringSchema,
  icon: IconSchema.nullable(),
  text: StringSchema,
  value: z.number().min(0),
};

export const CenterCardSchema = z
  .object({
    ...CardCommonShape,
    category: z.literal('center'),
    effect: CenterEffectSchema,
    repeat: z.object({ roundParity: RoundParitySchema }).strict().optional(),
  })
  .strict();

export const ExitCardSchema = z
  .object({
    ...CardCommonShape,
    category: z.literal('exit'),
    effect: ExitEffectSchema,
  })
  .strict();

export const TrapCardSchema = z
  .object({
    ...CardCommonShape,
    category: z.literal('trap'),
    trigger: TrapTriggerSchema,
    effect: TrapEffectSchema,
  })
  .strict();

export const CardDefinitionSchema = z.discriminatedUnion('category', [CenterCardSchema, ExitCardSchema, TrapCardSchema]);

export const CardCatalogFileSchema = z
  .object({
    version: z.literal(1),
    cards: z.array(CardDefinitionSchema).min(1),
  })
  .strict();

export const GameConfigSchema = z
  .object({
    turnsPerPlayer: z.number().int().min(1).max(100).default(10),
    deck: z.array(StringSchema).min(1).optional(),
    maxCenterTriggersPerTurn: z.number().int().min(1).default(32),
  })
  .strict();

export type CardDefinitionInput = z.input<typeof CardDefinitionSchema>;
export type GameConfigInput = z.input<typeof GameConfigSchema>;

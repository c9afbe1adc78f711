type Brand<TBase, TBrand extends string> = TBase & { readonly __brand: TBrand };

export type PlayerId = Brand<number, 'PlayerId'>;
export type CardName = Brand<string, 'CardName'>;
export type InstanceId = Brand<string, 'InstanceId'>;

export const asPlayerId = (value: number): PlayerId => value as PlayerId;
export const asCardName = (value: string): CardName => value as CardName;
export const asInstanceId = (value: string): InstanceId => value as InstanceId;

export const PLAYER_IDS: readonly [PlayerId, PlayerId] = [asPlayerId(0), asPlayerId(1)];

export const opponentOf = (player: PlayerId): PlayerId => asPlayerId(1 - player);

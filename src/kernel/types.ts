import type { CardName, InstanceId, PlayerId } from './branded.js';

export interface RngState {
  readonly algorithm: 'pcg-dxsm-128';
  readonly version: 1;
  readonly state: readonly bigint[];
}

export interface Rng {
  readonly state: RngState;
}

export type Icon = 'gear' | 'spark' | 'chip' | 'heart';

export const ALL_ICONS: readonly Icon[] = ['gear', 'spark', 'chip', 'heart'];

export type CardCategory = 'center' | 'exit' | 'trap';

export type Side = 'left' | 'right';

export type CenterEffect =
  | { readonly kind: 'score'; readonly points: number }
  | { readonly kind: 'parityScore'; readonly roundParity: RoundParity; readonly points: number }
  | { readonly kind: 'lonerBonus'; readonly points: number }
  | { readonly kind: 'copyNeighbours' }
  | { readonly kind: 'siphon'; readonly points: number; readonly opponentPoints: number }
  | { readonly kind: 'sharedIconsWithOpponent'; readonly pointsPerCard: number }
  | { readonly kind: 'iconVariety'; readonly distinct: number; readonly points: number; readonly fallbackPoints: number }
  | { readonly kind: 'selfPush'; readonly points: number }
  | { readonly kind: 'markTurn' }
  | { readonly kind: 'swapWithOpponent'; readonly points: number }
  | { readonly kind: 'emptySlots'; readonly pointsPerSlot: number }
  | { readonly kind: 'rowSize'; readonly size: number; readonly points: number }
  | { readonly kind: 'mimicLeft'; readonly points: number }
  | { readonly kind: 'forceOpponentPush'; readonly points: number }
  | { readonly kind: 'allIcons'; readonly points: number }
  | { readonly kind: 'selfRemove'; readonly points: number }
  | { readonly kind: 'marketLock'; readonly points: number; readonly opponentTurns: number }
  | { readonly kind: 'scavenge' }
  | { readonly kind: 'magnet'; readonly points: number }
  | { readonly kind: 'giveToOpponent'; readonly points: number };

export type ExitEffect =
  | { readonly kind: 'score'; readonly points: number }
  | { readonly kind: 'forceOpponentPush' }
  | { readonly kind: 'returnToHand' }
  | { readonly kind: 'giveToOpponent' }
  | { readonly kind: 'takeFromMarket' };

export type TrapTrigger =
  | { readonly kind: 'opponentCenterScore' }
  | { readonly kind: 'opponentMarketDraw' }
  | { readonly kind: 'opponentPlaysCenterIcon' };

export type TrapEffect =
  | { readonly kind: 'cancelScore'; readonly ownerPoints: number }
  | { readonly kind: 'redirectDraw' }
  | { readonly kind: 'divertPlay' }
  | { readonly kind: 'mirrorScore' };

export type RoundParity = 'even' | 'odd';

interface CardDefinitionBase {
  readonly name: CardName;
  readonly icon: Icon | null;
  readonly text: string;
  readonly value: number;
}

export interface CenterCardDefinition extends CardDefinitionBase {
  readonly category: 'center';
  readonly effect: CenterEffect;
  readonly repeat?: { readonly roundParity: RoundParity };
}

export interface ExitCardDefinition extends CardDefinitionBase {
  readonly category: 'exit';
  readonly effect: ExitEffect;
}

export interface TrapCardDefinition extends CardDefinitionBase {
  readonly category: 'trap';
  readonly trigger: TrapTrigger;
  readonly effect: TrapEffect;
}

export type CardDefinition = CenterCardDefinition | ExitCardDefinition | TrapCardDefinition;

export interface CardCatalog {
  readonly cards: readonly CardDefinition[];
  readonly byName: ReadonlyMap<CardName, CardDefinition>;
}

export interface GameConfig {
  readonly turnsPerPlayer: number;
  readonly deck?: readonly string[];
  readonly maxCenterTriggersPerTurn: number;
}

export interface GameDef {
  readonly catalog: CardCatalog;
  readonly config: GameConfig;
}

export interface InstanceMeta {
  readonly lastCenterScore?: number;
  readonly markedTurn?: number;
  readonly allIcons?: boolean;
  readonly mimickedIcon?: Icon;
}

export interface CardInstance {
  readonly id: InstanceId;
  readonly name: CardName;
  readonly faceDown: boolean;
  readonly meta: InstanceMeta;
}

export interface PlayerState {
  readonly hand: readonly CardInstance[];
  readonly row: readonly CardInstance[];
  readonly score: number;
}

export type ActiveEffect =
  | {
      readonly kind: 'marketLock';
      readonly owner: PlayerId;
      readonly source: InstanceId;
      readonly expiresTurn: number | null;
    }
  | {
      readonly kind: 'playCooldown';
      readonly owner: PlayerId;
      readonly card: InstanceId;
      readonly expiresTurn: number | null;
    };

export type GamePhase = 'play' | 'draw' | 'over';

export interface PlayAction {
  readonly handIndex: number;
  readonly side: Side;
  readonly faceDown: boolean;
}

export type DrawChoice =
  | { readonly source: 'deck' }
  | { readonly source: 'market'; readonly marketIndex: number };

export type ChoiceKind =
  | 'pushDirection'
  | 'swapTarget'
  | 'scavengeTarget'
  | 'marketPick'
  | 'placementSide'
  | 'edgePush'
  | 'discard'
  | 'trash';

export type ChoiceOption =
  | { readonly type: 'side'; readonly side: Side }
  | { readonly type: 'index'; readonly index: number }
  | { readonly type: 'slot'; readonly player: PlayerId; readonly index: number }
  | { readonly type: 'skip' };

export interface ChoiceRequest {
  readonly kind: ChoiceKind;
  readonly player: PlayerId;
  readonly source: CardName | null;
  readonly prompt: string;
  readonly options: readonly ChoiceOption[];
}

export type PendingStep =
  | { readonly kind: 'play'; readonly action: PlayAction }
  | { readonly kind: 'draw'; readonly draw: DrawChoice };

/**
 * Zones as they stood when a suspended step raised its request. Index and
 * slot options point into these, not into the pre-step zones of the state.
 */
export interface ChoiceView {
  readonly players: readonly [PlayerState, PlayerState];
  readonly market: readonly CardInstance[];
  readonly trash: readonly CardInstance[];
  readonly removed: readonly CardInstance[];
}

export interface PendingChoice {
  readonly step: PendingStep;
  readonly decisions: readonly ChoiceOption[];
  readonly request: ChoiceRequest;
  readonly view: ChoiceView;
}

export type GameEventKind =
  | 'deal'
  | 'play'
  | 'push'
  | 'centerScored'
  | 'exitScored'
  | 'effect'
  | 'trapRevealed'
  | 'deckDraw'
  | 'marketDraw'
  | 'discard'
  | 'trash'
  | 'refill'
  | 'skip'
  | 'turn'
  | 'delayedPayoff'
  | 'gameOver';

export interface GameEvent {
  readonly kind: GameEventKind;
  readonly player: PlayerId;
  readonly turn: number;
  readonly message: string;
  readonly card?: CardName;
  readonly points?: number;
}

export interface GameState {
  readonly players: readonly [PlayerState, PlayerState];
  readonly market: readonly CardInstance[];
  readonly deck: readonly CardInstance[];
  readonly trash: readonly CardInstance[];
  readonly removed: readonly CardInstance[];
  readonly activeEffects: readonly ActiveEffect[];
  readonly turn: number;
  readonly activePlayer: PlayerId;
  readonly phase: GamePhase;
  readonly pending: PendingChoice | null;
  readonly log: readonly GameEvent[];
}

export interface AgentInput<TLegal> {
  readonly def: GameDef;
  readonly state: GameState;
  readonly playerId: PlayerId;
  readonly legal: readonly TLegal[];
  readonly rng: Rng;
}

export interface AgentSelection<TLegal> {
  readonly selected: TLegal;
  readonly rng: Rng;
}

export interface Agent {
  chooseAction(input: AgentInput<PlayAction>): AgentSelection<PlayAction>;
  chooseDraw(input: AgentInput<DrawChoice>): AgentSelection<DrawChoice>;
  chooseOption(input: AgentInput<ChoiceOption> & { readonly request: ChoiceRequest }): AgentSelection<ChoiceOption>;
}

export interface StateDelta {
  readonly path: string;
  readonly before: unknown;
  readonly after: unknown;
}

export type DecisionSelection =
  | { readonly kind: 'play'; readonly action: PlayAction }
  | { readonly kind: 'draw'; readonly draw: DrawChoice }
  | { readonly kind: 'choice'; readonly request: ChoiceKind; readonly option: ChoiceOption };

export interface DecisionLog {
  readonly turn: number;
  readonly player: PlayerId;
  readonly selection: DecisionSelection;
  readonly legalCount: number;
  readonly deltas: readonly StateDelta[];
}

export type SimulationStopReason = 'terminal' | 'maxDecisions';

export interface GameTrace {
  readonly seed: number;
  readonly decisions: readonly DecisionLog[];
  readonly finalState: GameState;
  readonly winner: PlayerId | null;
  readonly turnsCount: number;
  readonly stopReason: SimulationStopReason;
}

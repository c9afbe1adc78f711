import type { InstanceId } from './branded.js';
import type { DecisionSource } from './decisions.js';
import type { ChoiceOption, ChoiceRequest, GameDef } from './types.js';
import type { WorkingState } from './zones.js';

export interface StepContext {
  readonly def: GameDef;
  readonly work: WorkingState;
  readonly decisions: DecisionSource;
  /** Center instance already credited for its current occupancy of the active row. */
  creditedCenter: InstanceId | null;
  centerTriggers: number;
}

export const requestChoice = (ctx: StepContext, request: ChoiceRequest): ChoiceOption => ctx.decisions.next(request);

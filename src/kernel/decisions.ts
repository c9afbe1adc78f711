import type { PlayerId } from './branded.js';
import { kernelRuntimeError, stateInvariantError } from './runtime-error.js';
import type { ChoiceOption, ChoiceRequest, Side } from './types.js';

export const optionKey = (option: ChoiceOption): string => {
  switch (option.type) {
    case 'side':
      return `side:${option.side}`;
    case 'index':
      return `index:${option.index}`;
    case 'slot':
      return `slot:${option.player}:${option.index}`;
    case 'skip':
      return 'skip';
  }
};

export const findOfferedOption = (request: ChoiceRequest, option: ChoiceOption): ChoiceOption | undefined => {
  const key = optionKey(option);
  return request.options.find((offered) => optionKey(offered) === key);
};

export const isOfferedOption = (request: ChoiceRequest, option: ChoiceOption): boolean =>
  findOfferedOption(request, option) !== undefined;

export const sideOptions = (sides: readonly Side[]): readonly ChoiceOption[] =>
  sides.map((side) => ({ type: 'side', side }));

export const indexOptions = (count: number): readonly ChoiceOption[] =>
  Array.from({ length: count }, (_, index) => ({ type: 'index', index }));

export const slotOption = (player: PlayerId, index: number): ChoiceOption => ({ type: 'slot', player, index });

/** Thrown through the resolver when a step needs a decision it has not been given yet. */
export class PendingChoiceSignal extends Error {
  readonly request: ChoiceRequest;

  constructor(request: ChoiceRequest) {
    super(`choice pending: ${request.kind}`);
    this.name = 'PendingChoiceSignal';
    this.request = request;
  }
}

/**
 * Feeds recorded decisions to a replayed step in order. Running out of
 * decisions suspends the step with the request that could not be answered.
 */
export class DecisionSource {
  private cursor = 0;

  constructor(private readonly decisions: readonly ChoiceOption[]) {}

  next(request: ChoiceRequest): ChoiceOption {
    if (request.options.length === 0) {
      throw kernelRuntimeError('CHOICE_WITHOUT_OPTIONS', `choice ${request.kind} was requested with no options`, {
        kind: request.kind,
      });
    }

    const decision = this.decisions[this.cursor];
    if (decision === undefined) {
      throw new PendingChoiceSignal(request);
    }
    if (!isOfferedOption(request, decision)) {
      throw stateInvariantError(`replayed decision ${optionKey(decision)} is not offered by ${request.kind}`);
    }
    this.cursor += 1;
    return decision;
  }

  assertExhausted(): void {
    if (this.cursor !== this.decisions.length) {
      throw stateInvariantError(`step completed with ${this.decisions.length - this.cursor} unused decisions`);
    }
  }
}

export const expectSide = (option: ChoiceOption): Side => {
  if (option.type !== 'side') {
    throw stateInvariantError(`expected a side option, received ${optionKey(option)}`);
  }
  return option.side;
};

export const expectIndex = (option: ChoiceOption): number => {
  if (option.type !== 'index') {
    throw stateInvariantError(`expected an index option, received ${optionKey(option)}`);
  }
  return option.index;
};

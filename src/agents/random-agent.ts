import { nextInt } from '../kernel/prng.js';
import type { Agent, AgentInput, AgentSelection } from '../kernel/types.js';

const pickUniformly = <T>(input: AgentInput<T>, surface: string): AgentSelection<T> => {
  if (input.legal.length === 0) {
    throw new Error(`RandomAgent.${surface} called with empty legal options`);
  }

  if (input.legal.length === 1) {
    const selected = input.legal[0];
    if (selected === undefined) {
      throw new Error(`RandomAgent.${surface} called with empty legal options`);
    }
    return { selected, rng: input.rng };
  }

  const [index, rng] = nextInt(input.rng, 0, input.legal.length - 1);
  const selected = input.legal[index];
  if (selected === undefined) {
    throw new Error(`RandomAgent.${surface} selected out-of-range index ${index}`);
  }
  return { selected, rng };
};

export class RandomAgent implements Agent {
  chooseAction(input: Parameters<Agent['chooseAction']>[0]): ReturnType<Agent['chooseAction']> {
    return pickUniformly(input, 'chooseAction');
  }

  chooseDraw(input: Parameters<Agent['chooseDraw']>[0]): ReturnType<Agent['chooseDraw']> {
    return pickUniformly(input, 'chooseDraw');
  }

  chooseOption(input: Parameters<Agent['chooseOption']>[0]): ReturnType<Agent['chooseOption']> {
    return pickUniformly(input, 'chooseOption');
  }
}

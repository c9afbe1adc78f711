import type { Agent } from '../kernel/types.js';
import { GreedyAgent } from './greedy-agent.js';
import { LookaheadAgent } from './lookahead-agent.js';
import { RandomAgent } from './random-agent.js';

export type AgentType = 'random' | 'greedy' | 'lookahead';

export interface AgentOptions {
  readonly depth?: number;
}

export const createAgent = (type: AgentType, options: AgentOptions = {}): Agent => {
  switch (type) {
    case 'random':
      return new RandomAgent();
    case 'greedy':
      return new GreedyAgent();
    case 'lookahead':
      return new LookaheadAgent(options.depth === undefined ? {} : { depth: options.depth });
  }
};

const isAgentType = (value: string): value is AgentType =>
  value === 'random' || value === 'greedy' || value === 'lookahead';

const parseDepth = (entry: string, raw: string): number => {
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid lookahead depth in agent spec entry: ${entry}`);
  }
  return Number(raw);
};

/** Parses `random,greedy` or `lookahead:3,random`; only lookahead takes a depth suffix. */
export const parseAgentSpec = (spec: string, playerCount: number): readonly Agent[] => {
  const entries = spec
    .split(',')
    .map((part) => part.trim().toLowerCase())
    .filter((part) => part.length > 0);

  if (entries.length !== playerCount) {
    throw new Error(`Agent spec has ${entries.length} agents but game needs ${playerCount} players`);
  }

  return entries.map((entry) => {
    const [type = '', depth, ...rest] = entry.split(':');
    if (!isAgentType(type)) {
      throw new Error(`Unknown agent type: ${type}. Allowed: random, greedy, lookahead`);
    }
    if (rest.length > 0 || (depth !== undefined && type !== 'lookahead')) {
      throw new Error(`Invalid agent spec entry: ${entry}`);
    }

    return createAgent(type, depth === undefined ? {} : { depth: parseDepth(entry, depth) });
  });
};

export * from './evaluate-state.js';
export * from './factory.js';
export * from './greedy-agent.js';
export * from './greedy-policy.js';
export * from './lookahead-agent.js';
export * from './random-agent.js';

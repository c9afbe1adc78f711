export * from './delta.js';
export * from './metrics.js';
export * from './simulator.js';

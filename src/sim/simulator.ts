import {
  applyAction,
  applyDraw,
  createInitialState,
  createRng,
  legalDraws,
  legalPlays,
  resolveChoice,
  stateInvariantError,
  winner,
} from '../kernel/index.js';
import type {
  Agent,
  DecisionLog,
  DecisionSelection,
  GameDef,
  GameState,
  GameTrace,
  PlayerId,
  Rng,
  SimulationStopReason,
} from '../kernel/index.js';
import { computeDeltas } from './delta.js';

const AGENT_RNG_MIX = 0x9e3779b97f4a7c15n;
export const DEFAULT_MAX_DECISIONS = 10_000;

const validateSeed = (seed: number): void => {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`seed must be a safe integer, received ${String(seed)}`);
  }
};

const validateMaxDecisions = (maxDecisions: number): void => {
  if (!Number.isSafeInteger(maxDecisions)) {
    throw new RangeError(`maxDecisions must be a safe integer, received ${String(maxDecisions)}`);
  }
  if (maxDecisions < 0) {
    throw new RangeError(`maxDecisions must be a non-negative safe integer, received ${String(maxDecisions)}`);
  }
};

const createAgentRngByPlayer = (seed: number, playerCount: number): readonly Rng[] =>
  Array.from(
    { length: playerCount },
    (_, playerIndex) => createRng(BigInt(seed) ^ (BigInt(playerIndex + 1) * AGENT_RNG_MIX)),
  );

interface DecisionStep {
  readonly player: PlayerId;
  readonly selection: DecisionSelection;
  readonly legalCount: number;
  readonly state: GameState;
  readonly rng: Rng;
}

/** Asks the owner of the next decision for it: an outstanding choice first, then the play or the draw. */
const takeDecision = (def: GameDef, state: GameState, agent: Agent, player: PlayerId, rng: Rng): DecisionStep => {
  const base = { def, state, playerId: player, rng };

  if (state.pending !== null) {
    const { request } = state.pending;
    const chosen = agent.chooseOption({ ...base, legal: request.options, request });
    return {
      player,
      selection: { kind: 'choice', request: request.kind, option: chosen.selected },
      legalCount: request.options.length,
      state: resolveChoice(def, state, chosen.selected),
      rng: chosen.rng,
    };
  }

  if (state.phase === 'play') {
    const legal = legalPlays(def, state);
    if (legal.length === 0) {
      throw stateInvariantError(`player ${player} is in the play phase with no legal play`);
    }
    const chosen = agent.chooseAction({ ...base, legal });
    return {
      player,
      selection: { kind: 'play', action: chosen.selected },
      legalCount: legal.length,
      state: applyAction(def, state, chosen.selected),
      rng: chosen.rng,
    };
  }

  const legal = legalDraws(state);
  if (legal.length === 0) {
    throw stateInvariantError(`player ${player} is in the draw phase with no legal draw`);
  }
  const chosen = agent.chooseDraw({ ...base, legal });
  return {
    player,
    selection: { kind: 'draw', draw: chosen.selected },
    legalCount: legal.length,
    state: applyDraw(def, state, chosen.selected),
    rng: chosen.rng,
  };
};

export const runGame = (
  def: GameDef,
  seed: number,
  agents: readonly Agent[],
  maxDecisions: number = DEFAULT_MAX_DECISIONS,
): GameTrace => {
  validateSeed(seed);
  validateMaxDecisions(maxDecisions);
  if (agents.length !== 2) {
    throw new RangeError(`agents length must equal player count 2, received ${agents.length}`);
  }

  let state = createInitialState(def, seed);
  const decisions: DecisionLog[] = [];
  const agentRngByPlayer = [...createAgentRngByPlayer(seed, agents.length)];
  let stopReason: SimulationStopReason = 'maxDecisions';

  while (true) {
    if (state.phase === 'over') {
      stopReason = 'terminal';
      break;
    }
    if (decisions.length >= maxDecisions) {
      stopReason = 'maxDecisions';
      break;
    }

    const player = state.pending?.request.player ?? state.activePlayer;
    const agent = agents[player];
    const agentRng = agentRngByPlayer[player];
    if (agent === undefined || agentRng === undefined) {
      throw new Error(`missing agent or agent RNG for player ${String(player)}`);
    }

    const step = takeDecision(def, state, agent, player, agentRng);
    agentRngByPlayer[player] = step.rng;

    decisions.push({
      turn: state.turn,
      player,
      selection: step.selection,
      legalCount: step.legalCount,
      deltas: computeDeltas(state, step.state),
    });
    state = step.state;
  }

  return {
    seed,
    decisions,
    finalState: state,
    winner: winner(state),
    turnsCount: state.turn,
    stopReason,
  };
};

export const runGames = (
  def: GameDef,
  seeds: readonly number[],
  agents: readonly Agent[],
  maxDecisions?: number,
): readonly GameTrace[] => seeds.map((seed) => runGame(def, seed, agents, maxDecisions));

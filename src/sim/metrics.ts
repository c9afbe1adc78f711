import type { GameEventKind, GameTrace } from '../kernel/index.js';

export interface GameSummary {
  readonly games: number;
  readonly wins: readonly [number, number];
  readonly ties: number;
  readonly winRates: readonly [number, number];
  readonly averageScores: readonly [number, number];
  readonly firstPlayerWinRate: number;
  readonly averageDecisions: number;
  readonly pointsByCard: Readonly<Record<string, number>>;
}

const SCORING_EVENTS: ReadonlySet<GameEventKind> = new Set<GameEventKind>(['centerScored', 'exitScored', 'delayedPayoff']);

const ratio = (count: number, total: number): number => (total === 0 ? 0 : count / total);

/**
 * Aggregates finished traces. Player 0 always moves first, so the first
 * player win rate is player 0's. Card points count what a card credited to
 * its owner before any trap reaction.
 */
export const summarizeGames = (traces: readonly GameTrace[]): GameSummary => {
  let firstWins = 0;
  let secondWins = 0;
  let ties = 0;
  let firstScore = 0;
  let secondScore = 0;
  let decisions = 0;
  const pointsByCard: Record<string, number> = {};

  for (const trace of traces) {
    if (trace.winner === 0) {
      firstWins += 1;
    } else if (trace.winner === 1) {
      secondWins += 1;
    } else {
      ties += 1;
    }

    const [first, second] = trace.finalState.players;
    firstScore += first.score;
    secondScore += second.score;
    decisions += trace.decisions.length;

    for (const event of trace.finalState.log) {
      if (!SCORING_EVENTS.has(event.kind) || event.card === undefined || event.points === undefined) {
        continue;
      }
      pointsByCard[event.card] = (pointsByCard[event.card] ?? 0) + event.points;
    }
  }

  const games = traces.length;
  return {
    games,
    wins: [firstWins, secondWins],
    ties,
    winRates: [ratio(firstWins, games), ratio(secondWins, games)],
    averageScores: [ratio(firstScore, games), ratio(secondScore, games)],
    firstPlayerWinRate: ratio(firstWins, games),
    averageDecisions: ratio(decisions, games),
    pointsByCard,
  };
};

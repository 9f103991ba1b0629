import { passMove, resignMove } from '../kernel/move.js';
import { computeGameResult } from '../kernel/scoring.js';
import type { Agent, GameState, Player } from '../kernel/types.js';

export interface TerminationStrategy {
  shouldPass(state: GameState, player: Player): boolean;
  shouldResign(state: GameState, player: Player): boolean;
}

export interface ResignLargeMarginOptions {
  /** Decision number of the resigning side (its own moves, this one included) from which resignation is considered. */
  readonly cutOffMove?: number;
  readonly margin?: number;
}

export const DEFAULT_RESIGN_CUT_OFF_MOVE = 160;
export const DEFAULT_RESIGN_MARGIN = 90;

const opponentJustPassed = (state: GameState): boolean => state.lastMove?.kind === 'pass';

const movesPlayedBy = (state: GameState, player: Player): number => {
  let count = 0;
  let node = state;
  while (node.previous !== null) {
    if (node.previous.nextPlayer === player) {
      count += 1;
    }
    node = node.previous;
  }
  return count;
};

export const neverTerminate: TerminationStrategy = {
  shouldPass: () => false,
  shouldResign: () => false,
};

export const passWhenOpponentPasses: TerminationStrategy = {
  shouldPass: opponentJustPassed,
  shouldResign: () => false,
};

export const resignLargeMargin = (options: ResignLargeMarginOptions = {}): TerminationStrategy => {
  const cutOffMove = options.cutOffMove ?? DEFAULT_RESIGN_CUT_OFF_MOVE;
  const margin = options.margin ?? DEFAULT_RESIGN_MARGIN;

  return {
    shouldPass: opponentJustPassed,
    shouldResign: (state, player) => {
      if (state.moveCount + 1 < cutOffMove || movesPlayedBy(state, player) + 1 < cutOffMove) {
        return false;
      }
      const projected = computeGameResult(state);
      return projected.winner !== player && projected.winningMargin >= margin;
    },
  };
};

export class TerminationAgent implements Agent {
  private readonly agent: Agent;
  private readonly strategy: TerminationStrategy;

  constructor(agent: Agent, strategy: TerminationStrategy = neverTerminate) {
    this.agent = agent;
    this.strategy = strategy;
  }

  chooseMove(input: Parameters<Agent['chooseMove']>[0]): ReturnType<Agent['chooseMove']> {
    if (this.strategy.shouldPass(input.state, input.player)) {
      return { move: passMove(), rng: input.rng };
    }
    if (this.strategy.shouldResign(input.state, input.player)) {
      return { move: resignMove(), rng: input.rng };
    }
    return this.agent.chooseMove(input);
  }
}

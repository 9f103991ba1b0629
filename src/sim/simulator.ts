import type { Logger } from 'winston';

import {
  applyMove,
  formatGameResult,
  formatMove,
  isOver,
  legalMoves,
  movesEqual,
  newGame,
  playerRng,
  result,
  type Agent,
  type BoardSizeInput,
  type GameOptions,
  type GameOutcome,
  type GameTrace,
  type MoveLog,
  type Player,
  type Rng,
  type SimulationStopReason,
} from '../kernel/index.js';
import { getSimLogger } from './logger.js';

export interface SimulationConfig {
  readonly boardSize: BoardSizeInput;
  readonly options?: GameOptions;
}

export interface SimulationAgents {
  readonly black: Agent;
  readonly white: Agent;
}

export interface RunGameOptions {
  readonly logger?: Logger;
}

const validateSeed = (seed: number): void => {
  if (!Number.isSafeInteger(seed)) {
    throw new RangeError(`seed must be a safe integer, received ${String(seed)}`);
  }
};

const validateMaxMoves = (maxMoves: number): void => {
  if (!Number.isSafeInteger(maxMoves) || maxMoves < 0) {
    throw new RangeError(`maxMoves must be a non-negative safe integer, received ${String(maxMoves)}`);
  }
};

const describeOutcome = (outcome: GameOutcome): string =>
  outcome.kind === 'resignation' ? `${outcome.resigned} resigned` : formatGameResult(outcome.result);

export const runGame = (
  config: SimulationConfig,
  seed: number,
  agents: SimulationAgents,
  maxMoves: number,
  options: RunGameOptions = {},
): GameTrace => {
  validateSeed(seed);
  validateMaxMoves(maxMoves);
  const log = options.logger ?? getSimLogger();

  let state = newGame(config.boardSize, config.options);
  const moveLogs: MoveLog[] = [];
  const agentRng: Record<Player, Rng> = {
    black: playerRng(seed, 'black'),
    white: playerRng(seed, 'white'),
  };
  let stopReason: SimulationStopReason = 'maxMoves';

  while (true) {
    if (isOver(state)) {
      stopReason = 'terminal';
      break;
    }
    if (moveLogs.length >= maxMoves) {
      stopReason = 'maxMoves';
      break;
    }

    const legal = legalMoves(state);
    const player = state.nextPlayer;
    const selected = agents[player].chooseMove({
      state,
      player,
      legalMoves: legal,
      rng: agentRng[player],
    });
    agentRng[player] = selected.rng;

    const trusted = legal.some((move) => movesEqual(move, selected.move));
    state = applyMove(state, selected.move, { trusted });
    moveLogs.push({
      player,
      move: selected.move,
      positionHash: state.board.positionHash(),
      legalMoveCount: legal.length,
    });
    if (log.isDebugEnabled()) {
      log.debug('move applied', { seed, moveNumber: moveLogs.length, move: formatMove(player, selected.move) });
    }
  }

  const outcome = result(state);
  if (outcome === null) {
    log.warn('game stopped before reaching a terminal state', { seed, maxMoves });
  } else {
    log.info('game finished', { seed, moves: moveLogs.length, result: describeOutcome(outcome) });
  }

  return {
    seed,
    moves: moveLogs,
    finalState: state,
    outcome,
    stopReason,
  };
};

export const runGames = (
  config: SimulationConfig,
  seeds: readonly number[],
  agents: SimulationAgents,
  maxMoves: number,
  options: RunGameOptions = {},
): readonly GameTrace[] => seeds.map((seed) => runGame(config, seed, agents, maxMoves, options));

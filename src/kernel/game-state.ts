import { Board } from './board.js';
import { passMove, playMove, resignMove } from './move.js';
import { otherPlayer } from './player.js';
import { illegalMoveError, IllegalStateError } from './runtime-error.js';
import { parseGameConfig, type BoardSizeInput, type GameOptions } from './schemas.js';
import { evaluateTerritory, scoreTerritory } from './scoring.js';
import { EMPTY_SITUATIONS } from './situation-history.js';
import { moverAfter, thueMorseMover, turnOverrideAfter } from './turn-order.js';
import type { GameOutcome, GameState, IllegalMoveReason, Move, Player, Point, Situation } from './types.js';

export interface ApplyMoveOptions {
  /**
   * Skip the legality gate for moves already taken from {@link legalMoves}.
   * Terminal states are still rejected.
   */
  readonly trusted?: boolean;
}

export const newGame = (boardSize: BoardSizeInput, options: GameOptions = {}): GameState => {
  const config = parseGameConfig(boardSize, options);
  const base = {
    board: Board.empty(config.size),
    previous: null,
    lastMove: null,
    seenSituations: EMPTY_SITUATIONS,
    komi: config.komi,
    moveCount: 0,
  };

  if (config.turnOverrideLimit === undefined) {
    return { ...base, nextPlayer: 'black' };
  }
  return {
    ...base,
    nextPlayer: thueMorseMover(0),
    turnOverrideLimit: config.turnOverrideLimit,
    turnIndex: 0,
  };
};

export const situationOf = (state: GameState): Situation => ({
  player: state.nextPlayer,
  hash: state.board.positionHash(),
});

export const isOver = (state: GameState): boolean => {
  const { lastMove } = state;
  if (lastMove === null) {
    return false;
  }
  if (lastMove.kind === 'resign') {
    return true;
  }
  return lastMove.kind === 'pass' && state.previous?.lastMove?.kind === 'pass';
};

const violatesSuperko = (state: GameState, point: Point): boolean => {
  // Without a capture the new stone makes the position differ from every earlier one.
  if (!state.board.willCapture(state.nextPlayer, point)) {
    return false;
  }
  const next = state.board.withStone(state.nextPlayer, point);
  return state.seenSituations.has({ player: otherPlayer(state.nextPlayer), hash: next.positionHash() });
};

export const illegalMoveReason = (state: GameState, move: Move): IllegalMoveReason | null => {
  if (isOver(state)) {
    return 'gameOver';
  }
  if (move.kind !== 'play') {
    return null;
  }

  const { board, nextPlayer } = state;
  if (!board.isOnGrid(move.point)) {
    return 'pointOffGrid';
  }
  if (board.get(move.point) !== null) {
    return 'pointOccupied';
  }
  if (board.isSelfCapture(nextPlayer, move.point)) {
    return 'selfCapture';
  }
  if (violatesSuperko(state, move.point)) {
    return 'superko';
  }
  return null;
};

export const isValidMove = (state: GameState, move: Move): boolean => illegalMoveReason(state, move) === null;

export const applyMove = (state: GameState, move: Move, options: ApplyMoveOptions = {}): GameState => {
  if (isOver(state)) {
    throw new IllegalStateError(move, state.moveCount);
  }
  if (options.trusted !== true) {
    const reason = illegalMoveReason(state, move);
    if (reason !== null) {
      throw illegalMoveError(move, state.nextPlayer, reason);
    }
  }

  return {
    board: move.kind === 'play' ? state.board.withStone(state.nextPlayer, move.point) : state.board,
    nextPlayer: moverAfter(state),
    previous: state,
    lastMove: move,
    seenSituations: state.seenSituations.with(situationOf(state)),
    komi: state.komi,
    moveCount: state.moveCount + 1,
    ...turnOverrideAfter(state),
  };
};

export const applyMoves = (state: GameState, moves: Iterable<Move>): GameState => {
  let current = state;
  for (const move of moves) {
    current = applyMove(current, move);
  }
  return current;
};

/** Legal plays in row-major order, then pass, then resign; empty once the game is over. */
export const legalMoves = (state: GameState): readonly Move[] => {
  if (isOver(state)) {
    return [];
  }

  const moves: Move[] = [];
  for (let row = 1; row <= state.board.rows; row += 1) {
    for (let col = 1; col <= state.board.cols; col += 1) {
      const move = playMove({ row, col });
      if (illegalMoveReason(state, move) === null) {
        moves.push(move);
      }
    }
  }
  moves.push(passMove(), resignMove());
  return moves;
};

/** Player who made the last move, or null at the root. */
export const lastMover = (state: GameState): Player | null => state.previous?.nextPlayer ?? null;

export const result = (state: GameState): GameOutcome | null => {
  if (!isOver(state)) {
    return null;
  }

  const resigned = state.lastMove?.kind === 'resign' ? lastMover(state) : null;
  if (resigned !== null) {
    return { kind: 'resignation', winner: otherPlayer(resigned), resigned };
  }

  const territory = evaluateTerritory(state.board);
  const gameResult = scoreTerritory(territory, state.komi);
  return { kind: 'score', winner: gameResult.winner, result: gameResult, territory };
};

export const moveHistory = (state: GameState): readonly Move[] => {
  const moves: Move[] = [];
  for (let node: GameState | null = state; node !== null; node = node.previous) {
    if (node.lastMove !== null) {
      moves.push(node.lastMove);
    }
  }
  return moves.reverse();
};

import type { IllegalMoveReason, Move, Player, Point } from './types.js';

export type KernelRuntimeErrorCode = 'ILLEGAL_MOVE' | 'GAME_ALREADY_OVER' | 'INVALID_GAME_CONFIG';

export type KernelInvariantErrorCode = 'POINT_OFF_GRID' | 'POINT_OCCUPIED' | 'GROUP_COLOR_MISMATCH';

export const ILLEGAL_MOVE_REASON_MESSAGES: Readonly<Record<IllegalMoveReason, string>> = {
  gameOver: 'game is already over',
  pointOffGrid: 'point is outside the board',
  pointOccupied: 'point is already occupied',
  selfCapture: 'play would capture its own group',
  superko: 'play would repeat an earlier position with the same player to move',
};

export interface KernelRuntimeErrorContextByCode {
  readonly ILLEGAL_MOVE: Readonly<{
    readonly move: Move;
    readonly player: Player;
    readonly reason: IllegalMoveReason;
  }>;
  readonly GAME_ALREADY_OVER: Readonly<{
    readonly move: Move;
    readonly moveCount: number;
  }>;
  readonly INVALID_GAME_CONFIG: Readonly<{
    readonly issues: readonly string[];
  }>;
}

export interface KernelInvariantErrorContextByCode {
  readonly POINT_OFF_GRID: Readonly<{ readonly point: Point; readonly rows: number; readonly cols: number }>;
  readonly POINT_OCCUPIED: Readonly<{ readonly point: Point; readonly occupant: Player }>;
  readonly GROUP_COLOR_MISMATCH: Readonly<{ readonly left: Player; readonly right: Player }>;
}

export type KernelRuntimeErrorContext<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> =
  KernelRuntimeErrorContextByCode[C];

function formatMessage(message: string, context?: unknown): string {
  if (context === undefined) {
    return message;
  }
  return `${message} context=${JSON.stringify(context)}`;
}

/**
 * Recoverable failures: the caller asked for something the rules forbid and
 * may try something else.
 */
export class KernelRuntimeError<C extends KernelRuntimeErrorCode = KernelRuntimeErrorCode> extends Error {
  readonly code: C;
  readonly context?: KernelRuntimeErrorContext<C>;

  constructor(code: C, message: string, context?: KernelRuntimeErrorContext<C>, cause?: unknown) {
    super(formatMessage(message, context));
    this.name = 'KernelRuntimeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    if (cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = cause;
    }
  }
}

/**
 * Contract violations by the caller (placing on an occupied point, merging
 * groups of different colors). Never caught inside the kernel.
 */
export class KernelInvariantError<C extends KernelInvariantErrorCode = KernelInvariantErrorCode> extends Error {
  readonly code: C;
  readonly context: KernelInvariantErrorContextByCode[C];

  constructor(code: C, message: string, context: KernelInvariantErrorContextByCode[C]) {
    super(formatMessage(message, context));
    this.name = 'KernelInvariantError';
    this.code = code;
    this.context = context;
  }
}

export const kernelRuntimeError = <C extends KernelRuntimeErrorCode>(
  code: C,
  message: string,
  context?: KernelRuntimeErrorContext<C>,
  cause?: unknown,
): KernelRuntimeError<C> => new KernelRuntimeError(code, message, context, cause);

export const kernelInvariantError = <C extends KernelInvariantErrorCode>(
  code: C,
  message: string,
  context: KernelInvariantErrorContextByCode[C],
): KernelInvariantError<C> => new KernelInvariantError(code, message, context);

const describeMove = (move: Move): string =>
  move.kind === 'play' ? `play(${move.point.row},${move.point.col})` : move.kind;

export class IllegalMoveError extends KernelRuntimeError<'ILLEGAL_MOVE'> {
  readonly move: Move;
  readonly player: Player;
  readonly reason: IllegalMoveReason;

  constructor(move: Move, player: Player, reason: IllegalMoveReason) {
    super(
      'ILLEGAL_MOVE',
      `Illegal move: ${player} ${describeMove(move)} reason=${reason} detail=${ILLEGAL_MOVE_REASON_MESSAGES[reason]}`,
      { move, player, reason },
    );
    this.name = 'IllegalMoveError';
    this.move = move;
    this.player = player;
    this.reason = reason;
  }
}

export class IllegalStateError extends KernelRuntimeError<'GAME_ALREADY_OVER'> {
  constructor(move: Move, moveCount: number) {
    super('GAME_ALREADY_OVER', `Cannot apply ${describeMove(move)}: game is already over`, { move, moveCount });
    this.name = 'IllegalStateError';
  }
}

export const illegalMoveError = (move: Move, player: Player, reason: IllegalMoveReason): IllegalMoveError =>
  new IllegalMoveError(move, player, reason);

export function isKernelRuntimeError(error: unknown): error is KernelRuntimeError {
  return error instanceof KernelRuntimeError;
}

export function isKernelErrorCode<C extends KernelRuntimeErrorCode>(
  error: unknown,
  code: C,
): error is KernelRuntimeError<C> {
  return isKernelRuntimeError(error) && error.code === code;
}

export function isKernelInvariantError(error: unknown): error is KernelInvariantError {
  return error instanceof KernelInvariantError;
}

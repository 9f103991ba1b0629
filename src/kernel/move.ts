import { pointsEqual } from './point.js';
import type { Move, Point } from './types.js';

const PASS: Move = Object.freeze({ kind: 'pass' });
const RESIGN: Move = Object.freeze({ kind: 'resign' });

export const playMove = (point: Point): Move => ({ kind: 'play', point });

export const passMove = (): Move => PASS;

export const resignMove = (): Move => RESIGN;

export const isPlay = (move: Move): move is Extract<Move, { readonly kind: 'play' }> => move.kind === 'play';

export const movesEqual = (left: Move, right: Move): boolean => {
  if (left.kind === 'play' && right.kind === 'play') {
    return pointsEqual(left.point, right.point);
  }
  return left.kind === right.kind;
};

import type { BoardSize, Point } from './types.js';

export const point = (row: number, col: number): Point => ({ row, col });

export const pointsEqual = (left: Point, right: Point): boolean => left.row === right.row && left.col === right.col;

export const pointKey = (p: Point): string => `${p.row},${p.col}`;

export const isOnGrid = (size: BoardSize, p: Point): boolean =>
  Number.isInteger(p.row) && Number.isInteger(p.col) && p.row >= 1 && p.row <= size.rows && p.col >= 1 && p.col <= size.cols;

/** Row-major dense index of a point; the inverse of {@link decodePointIndex}. */
export const encodePoint = (p: Point, cols: number): number => cols * (p.row - 1) + (p.col - 1);

export const decodePointIndex = (index: number, cols: number): Point => ({
  row: Math.floor(index / cols) + 1,
  col: (index % cols) + 1,
});

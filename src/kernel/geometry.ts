import { decodePointIndex } from './point.js';
import type { BoardSize, Point } from './types.js';

export interface BoardGeometry {
  readonly rows: number;
  readonly cols: number;
  readonly points: readonly Point[];
  /** Orthogonal neighbors per point index, clipped to the board. */
  readonly neighbors: readonly (readonly number[])[];
  /** Diagonal corners per point index, clipped to the board. */
  readonly corners: readonly (readonly number[])[];
}

const NEIGHBOR_DELTAS = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
] as const;

const CORNER_DELTAS = [
  [-1, -1],
  [-1, 1],
  [1, -1],
  [1, 1],
] as const;

const geometryCache = new Map<string, BoardGeometry>();

const buildTable = (
  size: BoardSize,
  points: readonly Point[],
  deltas: readonly (readonly [number, number])[],
): readonly (readonly number[])[] =>
  Object.freeze(
    points.map((p) => {
      const entries: number[] = [];
      for (const [deltaRow, deltaCol] of deltas) {
        const row = p.row + deltaRow;
        const col = p.col + deltaCol;
        if (row >= 1 && row <= size.rows && col >= 1 && col <= size.cols) {
          entries.push(size.cols * (row - 1) + (col - 1));
        }
      }
      return Object.freeze(entries);
    }),
  );

const buildGeometry = (size: BoardSize): BoardGeometry => {
  const points = Object.freeze(
    Array.from({ length: size.rows * size.cols }, (_, index) => Object.freeze(decodePointIndex(index, size.cols))),
  );

  return Object.freeze({
    rows: size.rows,
    cols: size.cols,
    points,
    neighbors: buildTable(size, points, NEIGHBOR_DELTAS),
    corners: buildTable(size, points, CORNER_DELTAS),
  });
};

/** Shared per-dimension tables; built on first use and never mutated afterwards. */
export const boardGeometry = (size: BoardSize): BoardGeometry => {
  const key = `${size.rows}x${size.cols}`;
  const cached = geometryCache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  const geometry = buildGeometry(size);
  geometryCache.set(key, geometry);
  return geometry;
};

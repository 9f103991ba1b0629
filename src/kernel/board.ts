import { boardGeometry, type BoardGeometry } from './geometry.js';
import { createGroup, mergedWith, withLiberty, withoutLiberty } from './group.js';
import { encodePoint, isOnGrid } from './point.js';
import { kernelInvariantError } from './runtime-error.js';
import type { BoardSize, Group, Player, Point, ReadonlyBoard } from './types.js';
import { EMPTY_BOARD_HASH, updateHashOccupancy, zobristTable, type ZobristTable } from './zobrist.js';

const EMPTY_NEIGHBORS: readonly number[] = [];

/**
 * Grid of immutable groups plus an incrementally maintained position hash.
 *
 * Every cell owned by a group points at the same group value; updates replace
 * the value in each of its cells, so a clone can share groups with the board
 * it was copied from without either side observing the other's changes.
 */
export class Board implements ReadonlyBoard {
  readonly rows: number;
  readonly cols: number;
  private readonly geometry: BoardGeometry;
  private readonly table: ZobristTable;
  private readonly grid: (Group | undefined)[];
  private hash: bigint;

  constructor(rows: number, cols: number) {
    this.rows = rows;
    this.cols = cols;
    this.geometry = boardGeometry({ rows, cols });
    this.table = zobristTable({ rows, cols });
    this.grid = new Array<Group | undefined>(rows * cols).fill(undefined);
    this.hash = EMPTY_BOARD_HASH;
  }

  static empty(size: BoardSize): Board {
    return new Board(size.rows, size.cols);
  }

  clone(): Board {
    const copy = new Board(this.rows, this.cols);
    for (let index = 0; index < this.grid.length; index += 1) {
      copy.grid[index] = this.grid[index];
    }
    copy.hash = this.hash;
    return copy;
  }

  isOnGrid(point: Point): boolean {
    return isOnGrid(this, point);
  }

  indexOf(point: Point): number {
    return encodePoint(point, this.cols);
  }

  pointAt(index: number): Point {
    const point = this.geometry.points[index];
    if (point === undefined) {
      throw new RangeError(`point index ${index} is outside a ${this.rows}x${this.cols} board`);
    }
    return point;
  }

  pointsOf(indices: Iterable<number>): readonly Point[] {
    return [...indices].sort((left, right) => left - right).map((index) => this.pointAt(index));
  }

  neighbors(point: Point): readonly Point[] {
    return this.indicesToPoints(this.neighborIndices(this.requireOnGrid(point)));
  }

  corners(point: Point): readonly Point[] {
    return this.indicesToPoints(this.geometry.corners[this.requireOnGrid(point)] ?? EMPTY_NEIGHBORS);
  }

  get(point: Point): Player | null {
    return this.getGroup(point)?.color ?? null;
  }

  getGroup(point: Point): Group | null {
    if (!this.isOnGrid(point)) {
      return null;
    }
    return this.grid[this.indexOf(point)] ?? null;
  }

  positionHash(): bigint {
    return this.hash;
  }

  *stones(): IterableIterator<readonly [Point, Player]> {
    for (let index = 0; index < this.grid.length; index += 1) {
      const group = this.grid[index];
      if (group !== undefined) {
        yield [this.pointAt(index), group.color];
      }
    }
  }

  withStone(player: Player, point: Point): Board {
    const next = this.clone();
    next.placeStone(player, point);
    return next;
  }

  placeStone(player: Player, point: Point): void {
    const index = this.requireOnGrid(point);
    const occupant = this.grid[index];
    if (occupant !== undefined) {
      throw kernelInvariantError('POINT_OCCUPIED', `Cannot place ${player} on occupied point`, {
        point,
        occupant: occupant.color,
      });
    }

    const adjacentSameColor: Group[] = [];
    const adjacentOppositeColor: Group[] = [];
    const liberties: number[] = [];

    for (const neighbor of this.neighborIndices(index)) {
      const neighborGroup = this.grid[neighbor];
      if (neighborGroup === undefined) {
        liberties.push(neighbor);
      } else if (neighborGroup.color === player) {
        if (!adjacentSameColor.includes(neighborGroup)) {
          adjacentSameColor.push(neighborGroup);
        }
      } else if (!adjacentOppositeColor.includes(neighborGroup)) {
        adjacentOppositeColor.push(neighborGroup);
      }
    }

    let placed = createGroup(player, [index], liberties);
    for (const sameColor of adjacentSameColor) {
      placed = mergedWith(placed, sameColor);
    }
    this.writeGroup(placed);
    this.hash = updateHashOccupancy(this.hash, this.table, index, player);

    for (const oppositeColor of adjacentOppositeColor) {
      const replacement = withoutLiberty(oppositeColor, index);
      if (replacement.liberties.size > 0) {
        this.writeGroup(replacement);
      } else {
        this.removeGroup(oppositeColor);
      }
    }
  }

  /** True when the play leaves its own group without liberties and captures nothing. */
  isSelfCapture(player: Player, point: Point): boolean {
    const friendlyGroups: Group[] = [];
    for (const neighbor of this.neighborIndices(this.requireOnGrid(point))) {
      const neighborGroup = this.grid[neighbor];
      if (neighborGroup === undefined) {
        return false;
      }
      if (neighborGroup.color === player) {
        friendlyGroups.push(neighborGroup);
      } else if (neighborGroup.liberties.size === 1) {
        return false;
      }
    }

    return friendlyGroups.every((group) => group.liberties.size === 1);
  }

  willCapture(player: Player, point: Point): boolean {
    for (const neighbor of this.neighborIndices(this.requireOnGrid(point))) {
      const neighborGroup = this.grid[neighbor];
      if (neighborGroup !== undefined && neighborGroup.color !== player && neighborGroup.liberties.size === 1) {
        return true;
      }
    }
    return false;
  }

  private neighborIndices(index: number): readonly number[] {
    return this.geometry.neighbors[index] ?? EMPTY_NEIGHBORS;
  }

  private indicesToPoints(indices: readonly number[]): readonly Point[] {
    return indices.map((index) => this.pointAt(index));
  }

  private requireOnGrid(point: Point): number {
    if (!this.isOnGrid(point)) {
      throw kernelInvariantError('POINT_OFF_GRID', 'Point is outside the board', {
        point,
        rows: this.rows,
        cols: this.cols,
      });
    }
    return this.indexOf(point);
  }

  private writeGroup(group: Group): void {
    group.stones.forEach((stone) => {
      this.grid[stone] = group;
    });
  }

  private removeGroup(group: Group): void {
    group.stones.forEach((stone) => {
      for (const neighbor of this.neighborIndices(stone)) {
        const neighborGroup = this.grid[neighbor];
        if (neighborGroup === undefined || neighborGroup === group) {
          continue;
        }
        this.writeGroup(withLiberty(neighborGroup, stone));
      }
      this.grid[stone] = undefined;
      this.hash = updateHashOccupancy(this.hash, this.table, stone, group.color);
    });
  }
}

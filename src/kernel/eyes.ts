import type { Player, Point, ReadonlyBoard } from './types.js';

const DIAGONAL_COUNT = 4;

/**
 * An empty point surrounded by `color` whose diagonals are also held: every
 * on-board corner when the point touches an edge, otherwise three of four.
 */
export const isPointAnEye = (board: ReadonlyBoard, point: Point, color: Player): boolean => {
  if (board.get(point) !== null) {
    return false;
  }
  for (const neighbor of board.neighbors(point)) {
    if (board.get(neighbor) !== color) {
      return false;
    }
  }

  const corners = board.corners(point);
  const friendlyCorners = corners.filter((corner) => board.get(corner) === color).length;
  const offBoardCorners = DIAGONAL_COUNT - corners.length;

  if (offBoardCorners > 0) {
    return offBoardCorners + friendlyCorners === DIAGONAL_COUNT;
  }
  return friendlyCorners >= 3;
};

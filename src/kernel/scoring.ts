import type { GameResult, GameState, Player, Point, ReadonlyBoard, Territory } from './types.js';

interface Region {
  readonly points: readonly Point[];
  readonly borders: ReadonlySet<Player>;
}

const collectRegion = (board: ReadonlyBoard, start: Point, visited: Set<number>): Region => {
  const points: Point[] = [];
  const borders = new Set<Player>();
  const stack: Point[] = [start];
  visited.add(board.indexOf(start));

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) {
      break;
    }
    points.push(current);

    for (const neighbor of board.neighbors(current)) {
      const occupant = board.get(neighbor);
      if (occupant !== null) {
        borders.add(occupant);
        continue;
      }
      const index = board.indexOf(neighbor);
      if (!visited.has(index)) {
        visited.add(index);
        stack.push(neighbor);
      }
    }
  }

  points.sort((left, right) => board.indexOf(left) - board.indexOf(right));
  return { points, borders };
};

/**
 * Area classification: an empty region bordered by a single color is that
 * color's territory; anything else (both colors, or no stones at all) is dame.
 * All stones on the board are treated as alive.
 */
export const evaluateTerritory = (board: ReadonlyBoard): Territory => {
  let blackStones = 0;
  let whiteStones = 0;
  let blackTerritory = 0;
  let whiteTerritory = 0;
  const damePoints: Point[] = [];
  const visited = new Set<number>();

  for (let row = 1; row <= board.rows; row += 1) {
    for (let col = 1; col <= board.cols; col += 1) {
      const point = { row, col };
      const stone = board.get(point);
      if (stone === 'black') {
        blackStones += 1;
        continue;
      }
      if (stone === 'white') {
        whiteStones += 1;
        continue;
      }
      if (visited.has(board.indexOf(point))) {
        continue;
      }

      const region = collectRegion(board, point, visited);
      if (region.borders.size === 1 && region.borders.has('black')) {
        blackTerritory += region.points.length;
      } else if (region.borders.size === 1 && region.borders.has('white')) {
        whiteTerritory += region.points.length;
      } else {
        damePoints.push(...region.points);
      }
    }
  }

  return {
    blackStones,
    whiteStones,
    blackTerritory,
    whiteTerritory,
    dame: damePoints.length,
    damePoints,
  };
};

export const createGameResult = (black: number, white: number, komi: number): GameResult => {
  const whiteTotal = white + komi;
  return {
    black,
    white,
    komi,
    winner: black > whiteTotal ? 'black' : 'white',
    winningMargin: Math.abs(black - whiteTotal),
  };
};

export const scoreTerritory = (territory: Territory, komi: number): GameResult =>
  createGameResult(
    territory.blackStones + territory.blackTerritory,
    territory.whiteStones + territory.whiteTerritory,
    komi,
  );

export const computeGameResult = (state: GameState, komi: number = state.komi): GameResult =>
  scoreTerritory(evaluateTerritory(state.board), komi);

/** `B+3.5` / `W+0.5`, one decimal place. */
export const formatGameResult = (result: GameResult): string => {
  const whiteTotal = result.white + result.komi;
  if (result.black > whiteTotal) {
    return `B+${(result.black - whiteTotal).toFixed(1)}`;
  }
  return `W+${(whiteTotal - result.black).toFixed(1)}`;
};

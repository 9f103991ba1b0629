import type { Move, Player, Point, ReadonlyBoard } from './types.js';

/** Board column letters; `I` is skipped by convention. */
export const COLUMN_LETTERS = 'ABCDEFGHJKLMNOPQRSTUVWXYZ';

const STONE_CHARS: Readonly<Record<Player | 'empty', string>> = {
  empty: ' . ',
  black: ' x ',
  white: ' o ',
};

export const coordsFromPoint = (point: Point): string => {
  const letter = COLUMN_LETTERS[point.col - 1];
  if (letter === undefined) {
    throw new RangeError(`column ${point.col} has no letter`);
  }
  return `${letter}${point.row}`;
};

export const pointFromCoords = (coords: string): Point => {
  const match = /^([A-HJ-Z])(\d+)$/.exec(coords.trim().toUpperCase());
  const letter = match?.[1];
  const digits = match?.[2];
  if (letter === undefined || digits === undefined) {
    throw new RangeError(`invalid coordinates "${coords}"`);
  }
  const row = Number(digits);
  if (row < 1) {
    throw new RangeError(`invalid coordinates "${coords}"`);
  }
  return { row, col: COLUMN_LETTERS.indexOf(letter) + 1 };
};

export const formatMove = (player: Player, move: Move): string => {
  switch (move.kind) {
    case 'pass':
      return `${player} passes`;
    case 'resign':
      return `${player} resigns`;
    case 'play':
      return `${player} ${coordsFromPoint(move.point)}`;
  }
};

/** Text diagram with the highest row first, matching the usual board orientation. */
export const renderBoard = (board: ReadonlyBoard): string => {
  const lines: string[] = [];
  for (let row = board.rows; row >= 1; row -= 1) {
    const bump = row <= 9 ? ' ' : '';
    let line = '';
    for (let col = 1; col <= board.cols; col += 1) {
      line += STONE_CHARS[board.get({ row, col }) ?? 'empty'];
    }
    lines.push(`${bump}${row} ${line}`);
  }
  lines.push(`    ${COLUMN_LETTERS.slice(0, board.cols).split('').join('  ')}`);
  return lines.join('\n');
};

import type { BoardSize, Player } from './types.js';

const MASK_64 = (1n << 64n) - 1n;
const FNV_OFFSET_BASIS_64 = 0xcbf29ce484222325n;
const FNV_PRIME_64 = 0x100000001b3n;
const encoder = new TextEncoder();

export type Occupant = Player | 'empty';

const OCCUPANT_SLOT: Readonly<Record<Occupant, number>> = {
  empty: 0,
  black: 1,
  white: 2,
};

export interface ZobristTable {
  readonly rows: number;
  readonly cols: number;
  /** Three codes per point index: empty, black, white. */
  readonly codes: readonly bigint[];
}

const fnv1a64 = (input: string): bigint => {
  const bytes = encoder.encode(input);
  let hash = FNV_OFFSET_BASIS_64;

  for (const byte of bytes) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME_64) & MASK_64;
  }

  return hash;
};

// FNV output over short, similar inputs is poorly distributed in the high bits.
const mix64 = (value: bigint): bigint => {
  let z = value & MASK_64;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
  return z ^ (z >> 31n);
};

/** Baseline hash of an empty board of any size. */
export const EMPTY_BOARD_HASH = mix64(fnv1a64('zobrist-empty-board-v1'));

export const zobristKey = (row: number, col: number, occupant: Occupant): bigint =>
  mix64(fnv1a64(`zobrist-key-v1|row=${row}|col=${col}|occupant=${occupant}`));

const tableCache = new Map<string, ZobristTable>();

/**
 * Codes depend only on (row, col, occupant), so independent games on the same
 * board size always agree on position hashes.
 */
export const zobristTable = (size: BoardSize): ZobristTable => {
  const key = `${size.rows}x${size.cols}`;
  const cached = tableCache.get(key);
  if (cached !== undefined) {
    return cached;
  }

  const codes: bigint[] = [];
  for (let row = 1; row <= size.rows; row += 1) {
    for (let col = 1; col <= size.cols; col += 1) {
      codes.push(zobristKey(row, col, 'empty'), zobristKey(row, col, 'black'), zobristKey(row, col, 'white'));
    }
  }

  const table: ZobristTable = Object.freeze({ rows: size.rows, cols: size.cols, codes: Object.freeze(codes) });
  tableCache.set(key, table);
  return table;
};

export const zobristCode = (table: ZobristTable, index: number, occupant: Occupant): bigint =>
  table.codes[index * 3 + OCCUPANT_SLOT[occupant]] ?? 0n;

/** Hash change for an empty point becoming `player`, or the reverse. */
export const updateHashOccupancy = (hash: bigint, table: ZobristTable, index: number, player: Player): bigint =>
  hash ^ zobristCode(table, index, 'empty') ^ zobristCode(table, index, player);

export const computeFullHash = (table: ZobristTable, stones: Iterable<readonly [number, Player]>): bigint => {
  let hash = EMPTY_BOARD_HASH;
  for (const [index, player] of stones) {
    hash = updateHashOccupancy(hash, table, index, player);
  }
  return hash;
};

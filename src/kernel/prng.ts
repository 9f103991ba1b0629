import type { Player, Rng } from './types.js';

const MASK_64 = (1n << 64n) - 1n;
const MASK_128 = (1n << 128n) - 1n;
const RAW_RANGE = 1n << 64n;

const LCG_MULTIPLIER = 0x2360ed051fc65da44385df649fccf645n;
const DXSM_MULTIPLIER = 0xda942042e4dd58b5n;
const SEED_MIX = 0x9e3779b97f4a7c15f39cc0605cedc835n;
const BASE_INCREMENT = 0xda3e39cb94b95bdbn;

const PLAYER_STREAM_MIX = 0x9e3779b97f4a7c15n;
const PLAYER_STREAM: Readonly<Record<Player, bigint>> = { black: 1n, white: 2n };

/** Output permutation applied to the pre-advance LCG state. */
const dxsm = (state: bigint): bigint => {
  const high = state >> 64n;
  const low = state & MASK_64;

  let word = ((high ^ (high >> 32n)) * DXSM_MULTIPLIER) & MASK_64;
  word = (word ^ (word >> 48n)) & MASK_64;
  return (word * (low | 1n)) & MASK_64;
};

export const createRng = (seed: bigint): Rng => {
  const seed128 = seed & MASK_128;
  return {
    state: (seed128 ^ SEED_MIX) & MASK_128,
    increment: (((seed128 << 1n) ^ BASE_INCREMENT) & MASK_128) | 1n,
  };
};

/** Independent stream for one side of a self-play game. */
export const playerRng = (seed: number, player: Player): Rng =>
  createRng(BigInt(seed) ^ (PLAYER_STREAM[player] * PLAYER_STREAM_MIX));

/** Next raw 64-bit output and the advanced generator; the input is left as it was. */
export const stepRng = (rng: Rng): readonly [bigint, Rng] => [
  dxsm(rng.state),
  { state: (rng.state * LCG_MULTIPLIER + rng.increment) & MASK_128, increment: rng.increment },
];

/** Uniform integer in `[min, max]` (rejection sampling on the raw output). */
export const nextInt = (rng: Rng, min: number, max: number): readonly [number, Rng] => {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new RangeError('nextInt bounds must be safe integers');
  }
  if (min > max) {
    throw new RangeError(`nextInt requires min <= max, received min=${min}, max=${max}`);
  }

  const span = BigInt(max) - BigInt(min) + 1n;
  if (span > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError('nextInt range exceeds Number.MAX_SAFE_INTEGER');
  }

  const limit = RAW_RANGE - (RAW_RANGE % span);
  let cursor = rng;
  while (true) {
    const [raw, next] = stepRng(cursor);
    cursor = next;
    if (raw < limit) {
      return [min + Number(raw % span), cursor];
    }
  }
};

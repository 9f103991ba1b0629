import { otherPlayer } from './player.js';
import type { GameState, Player } from './types.js';

const popcount = (value: number): number => {
  let count = 0;
  let remaining = value;
  while (remaining > 0) {
    count += remaining & 1;
    remaining = Math.floor(remaining / 2);
  }
  return count;
};

/** Thue-Morse term `n`: parity of the number of set bits. */
export const thueMorseTerm = (n: number): 0 | 1 => {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Thue-Morse index must be a non-negative safe integer, received ${String(n)}`);
  }
  return popcount(n) % 2 === 0 ? 0 : 1;
};

export const thueMorseSequence = (length: number): readonly (0 | 1)[] =>
  Array.from({ length }, (_, index) => thueMorseTerm(index));

export const thueMorseMover = (turnIndex: number): Player => (thueMorseTerm(turnIndex) === 0 ? 'black' : 'white');

/**
 * Mover of the state that follows `state`. Inside the override window the
 * Thue-Morse schedule decides; once the window closes, play alternates
 * starting from the opponent of the last scheduled mover.
 */
export const moverAfter = (state: GameState): Player => {
  if (state.turnOverrideLimit !== undefined && state.turnIndex !== undefined) {
    const nextIndex = state.turnIndex + 1;
    if (nextIndex < state.turnOverrideLimit) {
      return thueMorseMover(nextIndex);
    }
  }
  return otherPlayer(state.nextPlayer);
};

export const turnOverrideAfter = (
  state: GameState,
): Pick<GameState, 'turnOverrideLimit' | 'turnIndex'> => {
  if (state.turnOverrideLimit === undefined || state.turnIndex === undefined) {
    return {};
  }
  const nextIndex = state.turnIndex + 1;
  return nextIndex < state.turnOverrideLimit ? { turnOverrideLimit: state.turnOverrideLimit, turnIndex: nextIndex } : {};
};

import { isPointAnEye } from '../kernel/eyes.js';
import { passMove } from '../kernel/move.js';
import { nextInt } from '../kernel/prng.js';
import type { Agent, Move } from '../kernel/types.js';

/**
 * Uniform choice among legal plays that do not fill one of the mover's own
 * eyes. Passes when nothing else is left; never resigns.
 */
export class RandomAgent implements Agent {
  chooseMove(input: Parameters<Agent['chooseMove']>[0]): ReturnType<Agent['chooseMove']> {
    const { state, player } = input;
    const candidates = input.legalMoves.filter(
      (move): move is Extract<Move, { readonly kind: 'play' }> =>
        move.kind === 'play' && !isPointAnEye(state.board, move.point, player),
    );

    if (candidates.length === 0) {
      return { move: passMove(), rng: input.rng };
    }

    const [index, rng] = nextInt(input.rng, 0, candidates.length - 1);
    const move = candidates[index];
    if (move === undefined) {
      throw new Error(`RandomAgent.chooseMove selected out-of-range index ${index}`);
    }
    return { move, rng };
  }
}

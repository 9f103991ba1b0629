import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  applyMove,
  applyMoves,
  illegalMoveReason,
  moverAfter,
  newGame,
  playMove,
  result,
  resignMove,
  thueMorseMover,
  thueMorseSequence,
  thueMorseTerm,
  type GameState,
} from '../../../src/kernel/index.js';
import { toMoves } from '../../helpers/board-helpers.js';

const playAlongFirstRow = (state: GameState, count: number): readonly GameState[] => {
  const states = [state];
  let current = state;
  for (let index = 0; index < count; index += 1) {
    current = applyMove(current, playMove({ row: 1 + 2 * Math.floor(index / 4), col: 1 + 2 * (index % 4) }));
    states.push(current);
  }
  return states;
};

describe('Thue-Morse sequence', () => {
  it('is the parity of the set-bit count', () => {
    assert.deepEqual(thueMorseSequence(8), [0, 1, 1, 0, 1, 0, 0, 1]);
    assert.equal(thueMorseTerm(1023), 0);
    assert.equal(thueMorseTerm(1024), 1);
  });

  it('forces black, white, white, black for the first four turns', () => {
    assert.deepEqual([0, 1, 2, 3].map(thueMorseMover), ['black', 'white', 'white', 'black']);
  });

  it('rejects negative indices', () => {
    assert.throws(() => thueMorseTerm(-1), RangeError);
  });
});

describe('turn override schedule', () => {
  it('follows the schedule inside the limit and alternates afterwards', () => {
    const states = playAlongFirstRow(newGame(9, { turnOverrideLimit: 4 }), 6);

    assert.deepEqual(
      states.map((state) => state.nextPlayer),
      ['black', 'white', 'white', 'black', 'white', 'black', 'white'],
    );
    assert.deepEqual(
      states.map((state) => state.turnIndex),
      [0, 1, 2, 3, undefined, undefined, undefined],
    );

    const board = states[6]?.board;
    assert.ok(board);
    assert.equal(board.get({ row: 1, col: 1 }), 'black');
    assert.equal(board.get({ row: 1, col: 3 }), 'white');
    assert.equal(board.get({ row: 1, col: 5 }), 'white');
    assert.equal(board.get({ row: 1, col: 7 }), 'black');
    assert.equal(board.get({ row: 3, col: 1 }), 'white');
    assert.equal(board.get({ row: 3, col: 3 }), 'black');
  });

  it('treats a zero limit as plain alternation', () => {
    const root = newGame(9, { turnOverrideLimit: 0 });
    const states = playAlongFirstRow(root, 3);

    assert.equal(root.turnOverrideLimit, undefined);
    assert.deepEqual(
      states.map((state) => state.nextPlayer),
      ['black', 'white', 'black', 'white'],
    );
  });

  it('hands a resignation to the opponent of the resigner even when the schedule repeats a mover', () => {
    const afterFirst = applyMove(newGame(9, { turnOverrideLimit: 4 }), playMove({ row: 5, col: 5 }));
    const resigned = applyMoves(afterFirst, [resignMove()]);

    assert.equal(resigned.nextPlayer, 'white');
    assert.deepEqual(result(resigned), { kind: 'resignation', winner: 'black', resigned: 'white' });
  });

  it('keys the ko check on the opponent of the mover even when the schedule repeats the mover', () => {
    // Black has just taken the ko at (2,3); white retaking at (2,2) restores the earlier board.
    const afterTake = applyMoves(
      newGame(4),
      toMoves([[1, 2], [1, 3], [2, 1], [2, 4], [3, 2], [3, 3], [4, 4], [2, 2], [2, 3]]),
    );
    const scheduled: GameState = { ...afterTake, turnOverrideLimit: 16, turnIndex: 1 };

    assert.equal(scheduled.nextPlayer, 'white');
    assert.equal(moverAfter(scheduled), 'white');
    assert.equal(illegalMoveReason(scheduled, playMove({ row: 2, col: 2 })), 'superko');
  });
});

import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { applyMoves, Board, isKernelInvariantError, newGame, playMove } from '../../../src/kernel/index.js';
import { boardFromDiagram } from '../../helpers/board-helpers.js';

describe('Board.placeStone', () => {
  it('creates a single-stone group with its empty neighbors as liberties', () => {
    const board = new Board(5, 5);
    board.placeStone('black', { row: 3, col: 3 });

    const group = board.getGroup({ row: 3, col: 3 });
    assert.ok(group);
    assert.equal(board.get({ row: 3, col: 3 }), 'black');
    assert.deepEqual(board.pointsOf(group.stones), [{ row: 3, col: 3 }]);
    assert.deepEqual(board.pointsOf(group.liberties), [
      { row: 2, col: 3 },
      { row: 3, col: 2 },
      { row: 3, col: 4 },
      { row: 4, col: 3 },
    ]);
  });

  it('merges adjacent same-color stones into one shared group', () => {
    const board = new Board(5, 5);
    board.placeStone('black', { row: 3, col: 3 });
    board.placeStone('black', { row: 3, col: 4 });

    const left = board.getGroup({ row: 3, col: 3 });
    const right = board.getGroup({ row: 3, col: 4 });
    assert.ok(left);
    assert.equal(left, right);
    assert.equal(left.stones.size, 2);
    assert.deepEqual(board.pointsOf(left.liberties), [
      { row: 2, col: 3 },
      { row: 2, col: 4 },
      { row: 3, col: 2 },
      { row: 3, col: 5 },
      { row: 4, col: 3 },
      { row: 4, col: 4 },
    ]);
  });

  it('takes a liberty from an adjacent opposite-color group', () => {
    const board = new Board(5, 5);
    board.placeStone('black', { row: 3, col: 3 });
    board.placeStone('white', { row: 2, col: 3 });

    assert.equal(board.getGroup({ row: 3, col: 3 })?.liberties.size, 3);
    assert.deepEqual(board.pointsOf(board.getGroup({ row: 2, col: 3 })?.liberties ?? []), [
      { row: 1, col: 3 },
      { row: 2, col: 2 },
      { row: 2, col: 4 },
    ]);
  });

  it('captures a group at zero liberties and gives each freed point back once to every neighbor group', () => {
    const board = boardFromDiagram([
      'xx..',
      'oo..',
      '....',
      '....',
    ]);
    board.placeStone('white', { row: 1, col: 3 });

    assert.equal(board.get({ row: 1, col: 1 }), null);
    assert.equal(board.get({ row: 1, col: 2 }), null);

    const lower = board.getGroup({ row: 2, col: 1 });
    assert.ok(lower);
    assert.deepEqual(board.pointsOf(lower.liberties), [
      { row: 1, col: 1 },
      { row: 1, col: 2 },
      { row: 2, col: 3 },
      { row: 3, col: 1 },
      { row: 3, col: 2 },
    ]);

    const capturer = board.getGroup({ row: 1, col: 3 });
    assert.ok(capturer);
    assert.deepEqual(board.pointsOf(capturer.liberties), [
      { row: 1, col: 2 },
      { row: 1, col: 4 },
      { row: 2, col: 3 },
    ]);
  });

  it('leaves the same hash as a board that never held the captured stones', () => {
    const captured = boardFromDiagram([
      'xx..',
      'oo..',
      '....',
      '....',
    ]);
    captured.placeStone('white', { row: 1, col: 3 });

    const direct = boardFromDiagram([
      '..o.',
      'oo..',
      '....',
      '....',
    ]);

    assert.equal(captured.positionHash(), direct.positionHash());
  });

  it('fails fast on an occupied or off-grid point', () => {
    const board = new Board(3, 3);
    board.placeStone('black', { row: 2, col: 2 });

    assert.throws(
      () => board.placeStone('white', { row: 2, col: 2 }),
      (error: unknown) => isKernelInvariantError(error) && error.code === 'POINT_OCCUPIED',
    );
    assert.throws(
      () => board.placeStone('white', { row: 4, col: 1 }),
      (error: unknown) => isKernelInvariantError(error) && error.code === 'POINT_OFF_GRID',
    );
  });
});

describe('Board.isSelfCapture', () => {
  it('is true for a play into opponent stones that still have other liberties', () => {
    const board = boardFromDiagram([
      '.o.',
      'o..',
      '...',
    ]);

    assert.equal(board.isSelfCapture('black', { row: 1, col: 1 }), true);
    assert.equal(board.isSelfCapture('white', { row: 1, col: 1 }), false);
  });

  it('is false when the play captures an opponent group', () => {
    const board = boardFromDiagram([
      '.ox',
      'ox.',
      '...',
    ]);

    assert.equal(board.getGroup({ row: 1, col: 2 })?.liberties.size, 1);
    assert.equal(board.isSelfCapture('black', { row: 1, col: 1 }), false);
    assert.equal(board.willCapture('black', { row: 1, col: 1 }), true);
  });

  it('is true when every friendly neighbor group is down to this last liberty', () => {
    const board = boardFromDiagram([
      '.xo',
      'oo.',
      '...',
    ]);

    assert.equal(board.isSelfCapture('black', { row: 1, col: 1 }), true);
  });

  it('is false when a friendly neighbor group keeps another liberty', () => {
    const board = boardFromDiagram([
      '.x.',
      'oo.',
      '...',
    ]);

    assert.equal(board.isSelfCapture('black', { row: 1, col: 1 }), false);
  });

  it('does not change the board it inspects', () => {
    const board = boardFromDiagram([
      '.o.',
      'o..',
      '...',
    ]);
    const before = board.positionHash();

    board.isSelfCapture('black', { row: 1, col: 1 });
    board.willCapture('black', { row: 1, col: 1 });

    assert.equal(board.positionHash(), before);
    assert.equal(board.get({ row: 1, col: 1 }), null);
  });
});

describe('Board.willCapture', () => {
  it('is false when no adjacent opponent group is in atari', () => {
    const board = boardFromDiagram([
      '.o.',
      '...',
      '...',
    ]);

    assert.equal(board.willCapture('black', { row: 1, col: 1 }), false);
    assert.equal(board.willCapture('white', { row: 1, col: 1 }), false);
  });
});

describe('Board snapshots', () => {
  it('clone and withStone leave the source board unchanged', () => {
    const board = new Board(3, 3);
    board.placeStone('black', { row: 1, col: 1 });
    const hash = board.positionHash();

    const copy = board.clone();
    copy.placeStone('white', { row: 1, col: 2 });
    const next = board.withStone('white', { row: 2, col: 1 });

    assert.equal(board.positionHash(), hash);
    assert.equal(board.get({ row: 1, col: 2 }), null);
    assert.equal(board.get({ row: 2, col: 1 }), null);
    assert.equal(board.getGroup({ row: 1, col: 1 })?.liberties.size, 2);
    assert.equal(copy.getGroup({ row: 1, col: 1 })?.liberties.size, 1);
    assert.equal(next.getGroup({ row: 1, col: 1 })?.liberties.size, 1);
  });

  it('lists stones row-major and exposes clipped neighbors and corners', () => {
    const board = boardFromDiagram([
      '..o',
      'x..',
      '...',
    ]);

    assert.deepEqual(
      [...board.stones()],
      [
        [{ row: 1, col: 3 }, 'white'],
        [{ row: 2, col: 1 }, 'black'],
      ],
    );
    assert.deepEqual(board.neighbors({ row: 1, col: 1 }), [
      { row: 2, col: 1 },
      { row: 1, col: 2 },
    ]);
    assert.deepEqual(board.corners({ row: 1, col: 1 }), [{ row: 2, col: 2 }]);
    assert.equal(board.getGroup({ row: 0, col: 1 }), null);
  });
});

describe('Board.pointsOf', () => {
  it('turns a group read from a game state into points in row-major order', () => {
    const state = applyMoves(newGame(5), [
      playMove({ row: 2, col: 3 }),
      playMove({ row: 5, col: 5 }),
      playMove({ row: 2, col: 2 }),
    ]);
    const group = state.board.getGroup({ row: 2, col: 3 });

    assert.ok(group);
    assert.deepEqual(state.board.pointsOf(group.stones), [
      { row: 2, col: 2 },
      { row: 2, col: 3 },
    ]);
    assert.deepEqual(state.board.pointsOf(group.liberties), [
      { row: 1, col: 2 },
      { row: 1, col: 3 },
      { row: 2, col: 1 },
      { row: 2, col: 4 },
      { row: 3, col: 2 },
      { row: 3, col: 3 },
    ]);
  });

  it('rejects an index outside the board', () => {
    assert.throws(() => new Board(3, 3).pointsOf([9]), RangeError);
  });
});

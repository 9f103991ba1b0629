import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createRng, nextInt, playerRng, stepRng } from '../../../src/kernel/index.js';

const firstOutputs = (seed: bigint, count: number): readonly bigint[] => {
  let rng = createRng(seed);
  const outputs: bigint[] = [];

  for (let i = 0; i < count; i += 1) {
    const [value, nextRng] = stepRng(rng);
    outputs.push(value);
    rng = nextRng;
  }

  return outputs;
};

describe('prng', () => {
  it('seed 42n produces the expected first raw outputs', () => {
    assert.deepEqual(firstOutputs(42n, 5), [
      0xba5909abdeb2f2e0n,
      0x6131c7d2a2dabe94n,
      0x6182f1eef548858bn,
      0xb0bc3847b67e2341n,
      0xcb17407ae4b8eb69n,
    ]);
  });

  it('different seeds produce different streams', () => {
    assert.notDeepEqual(firstOutputs(42n, 5), firstOutputs(43n, 5));
  });

  it('stepping leaves the previous generator untouched', () => {
    const rng = createRng(7n);
    const snapshot = { ...rng };
    const [, nextRng] = stepRng(rng);

    assert.notEqual(nextRng.state, rng.state);
    assert.equal(nextRng.increment, rng.increment);
    assert.deepEqual(rng, snapshot);
  });

  it('keeps an odd increment for every seed', () => {
    for (const seed of [0n, 1n, -1n, 1n << 127n]) {
      assert.equal(createRng(seed).increment & 1n, 1n);
    }
  });

  it('nextInt stays inside inclusive bounds and returns the degenerate range directly', () => {
    let rng = createRng(11n);
    for (let i = 0; i < 200; i += 1) {
      const [value, nextRng] = nextInt(rng, -3, 3);
      assert.ok(value >= -3 && value <= 3);
      rng = nextRng;
    }
    assert.equal(nextInt(createRng(11n), 5, 5)[0], 5);
  });

  it('nextInt rejects inverted or unsafe bounds', () => {
    assert.throws(() => nextInt(createRng(1n), 2, 1), RangeError);
    assert.throws(() => nextInt(createRng(1n), 0.5, 1), RangeError);
  });

  it('gives each player of a seed its own reproducible stream', () => {
    const black = playerRng(17, 'black');
    const white = playerRng(17, 'white');

    assert.deepEqual(black, playerRng(17, 'black'));
    assert.notEqual(stepRng(black)[0], stepRng(white)[0]);
    assert.deepEqual(black, createRng(17n ^ 0x9e3779b97f4a7c15n));
    assert.deepEqual(white, createRng(17n ^ (2n * 0x9e3779b97f4a7c15n)));
  });
});

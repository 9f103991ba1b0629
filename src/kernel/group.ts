import { kernelInvariantError } from './runtime-error.js';
import type { Group, Player } from './types.js';

// Stones and liberties are point indices (see encodePoint).

export const createGroup = (color: Player, stones: Iterable<number>, liberties: Iterable<number>): Group => ({
  color,
  stones: new Set(stones),
  liberties: new Set(liberties),
});

export const withoutLiberty = (group: Group, index: number): Group => {
  if (!group.liberties.has(index)) {
    return group;
  }
  const liberties = new Set(group.liberties);
  liberties.delete(index);
  return { color: group.color, stones: group.stones, liberties };
};

export const withLiberty = (group: Group, index: number): Group => {
  if (group.liberties.has(index)) {
    return group;
  }
  const liberties = new Set(group.liberties);
  liberties.add(index);
  return { color: group.color, stones: group.stones, liberties };
};

export const mergedWith = (group: Group, other: Group): Group => {
  if (group.color !== other.color) {
    throw kernelInvariantError('GROUP_COLOR_MISMATCH', 'Cannot merge groups of different colors', {
      left: group.color,
      right: other.color,
    });
  }

  const stones = new Set(group.stones);
  other.stones.forEach((stone) => stones.add(stone));

  const liberties = new Set<number>();
  for (const source of [group.liberties, other.liberties]) {
    source.forEach((liberty) => {
      if (!stones.has(liberty)) {
        liberties.add(liberty);
      }
    });
  }

  return { color: group.color, stones, liberties };
};

import type { Situation, SituationSet } from './types.js';

const BITS_PER_LEVEL = 5n;
const SLOT_MASK = 31n;
const BRANCH_WIDTH = 32;

interface Leaf {
  readonly kind: 'leaf';
  readonly hash: bigint;
  readonly players: readonly Situation['player'][];
}

interface Branch {
  readonly kind: 'branch';
  readonly children: readonly (TrieNode | undefined)[];
}

type TrieNode = Leaf | Branch;

const slotAt = (hash: bigint, depth: number): number => Number((hash >> (BigInt(depth) * BITS_PER_LEVEL)) & SLOT_MASK);

const leafOf = (situation: Situation): Leaf => ({ kind: 'leaf', hash: situation.hash, players: [situation.player] });

const branchOf = (existing: Leaf, depth: number): Branch => {
  const children = new Array<TrieNode | undefined>(BRANCH_WIDTH).fill(undefined);
  children[slotAt(existing.hash, depth)] = existing;
  return { kind: 'branch', children };
};

const insert = (node: TrieNode | undefined, situation: Situation, depth: number): TrieNode => {
  if (node === undefined) {
    return leafOf(situation);
  }

  if (node.kind === 'leaf') {
    if (node.hash === situation.hash) {
      return node.players.includes(situation.player)
        ? node
        : { kind: 'leaf', hash: node.hash, players: [...node.players, situation.player] };
    }
    return insert(branchOf(node, depth), situation, depth);
  }

  const slot = slotAt(situation.hash, depth);
  const child = node.children[slot];
  const updated = insert(child, situation, depth + 1);
  if (updated === child) {
    return node;
  }
  const children = [...node.children];
  children[slot] = updated;
  return { kind: 'branch', children };
};

const contains = (root: TrieNode | undefined, situation: Situation): boolean => {
  let node = root;
  let depth = 0;
  while (node !== undefined) {
    if (node.kind === 'leaf') {
      return node.hash === situation.hash && node.players.includes(situation.player);
    }
    node = node.children[slotAt(situation.hash, depth)];
    depth += 1;
  }
  return false;
};

/**
 * Persistent hash trie over 64-bit position hashes. Adding a situation copies
 * only the path to its leaf, so every game state can own its full history
 * while sharing structure with its ancestors and siblings.
 */
class PersistentSituationSet implements SituationSet {
  readonly size: number;
  private readonly root: TrieNode | undefined;

  constructor(root: TrieNode | undefined, size: number) {
    this.root = root;
    this.size = size;
  }

  has(situation: Situation): boolean {
    return contains(this.root, situation);
  }

  with(situation: Situation): SituationSet {
    const root = insert(this.root, situation, 0);
    return root === this.root ? this : new PersistentSituationSet(root, this.size + 1);
  }
}

export const EMPTY_SITUATIONS: SituationSet = new PersistentSituationSet(undefined, 0);

export const situationSetOf = (situations: Iterable<Situation>): SituationSet => {
  let set = EMPTY_SITUATIONS;
  for (const situation of situations) {
    set = set.with(situation);
  }
  return set;
};

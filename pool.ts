/**
 * order-statistics pool over positions 0..size-1
 * fenwick tree of presence counts, rank lookup and removal in O(log n)
 */
export type RankPool = {
  /** positions left */
  size: () => number;
  /** position holding the given rank among the positions left */
  at: (rank: number) => number;
  /** take a position out of the pool */
  remove: (position: number) => void;
};

export const rankPool = (size: number): RankPool => {
  // 1-based tree, every position starts present
  const tree = new Int32Array(size + 1);
  for (let i = 1; i <= size; i++) {
    tree[i] += 1;
    const parent = i + (i & -i);
    if (parent <= size) tree[parent] += tree[i];
  }
  let top = 1;
  while (top * 2 <= size) top *= 2;

  let left = size;
  const present = new Uint8Array(size).fill(1);

  return {
    size: () => left,
    at: (rank) => {
      if (!Number.isInteger(rank) || rank < 0 || rank >= left)
        throw new RangeError(`rank ${rank} out of range [0, ${left})`);
      // descend to the last prefix with sum <= rank
      let position = 0;
      let remaining = rank;
      for (let step = top; step > 0; step >>= 1) {
        const next = position + step;
        if (next <= size && tree[next] <= remaining) {
          position = next;
          remaining -= tree[next];
        }
      }
      return position;
    },
    remove: (position) => {
      if (!present[position]) return;
      present[position] = 0;
      left -= 1;
      for (let i = position + 1; i <= size; i += i & -i) tree[i] -= 1;
    },
  };
};

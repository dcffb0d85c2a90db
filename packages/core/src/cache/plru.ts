// Tree pseudo-LRU over a power-of-two number of ways.
//
// The tree is heap-indexed: node 0 is the root, node n has children 2n+1 (left) and
// 2n+2 (right), and bit n of the state word belongs to node n. A 0 bit sends the victim
// walk left, a 1 bit sends it right. For 4 ways this gives the 3-bit layout
//
//              b0
//            /    \
//          b1      b2
//         /  \    /  \
//        w0  w1  w2  w3
//
// Accessing a way sets every bit on its path to point at the other subtree.

export function plruBits(numWays: number): number {
  return numWays - 1;
}

export function selectVictim(tree: number, numWays: number): number {
  let node = 0;
  let lo = 0;
  let span = numWays;
  while (span > 1) {
    const half = span >>> 1;
    if (((tree >>> node) & 1) === 0) {
      node = 2 * node + 1;
    } else {
      lo += half;
      node = 2 * node + 2;
    }
    span = half;
  }
  return lo;
}

export function updatePlru(tree: number, accessedWay: number, numWays: number): number {
  let next = tree >>> 0;
  let node = 0;
  let lo = 0;
  let span = numWays;
  while (span > 1) {
    const half = span >>> 1;
    if (accessedWay < lo + half) {
      next |= 1 << node;
      node = 2 * node + 1;
    } else {
      next &= ~(1 << node);
      lo += half;
      node = 2 * node + 2;
    }
    span = half;
  }
  return next >>> 0;
}

/**
 * Set of endpoint ranks below a fixed capacity, iterated in ascending order.
 */
export class RankBitset {
  private readonly words: Uint32Array;

  constructor(capacity: number) {
    this.words = new Uint32Array((capacity + 31) >>> 5);
  }

  mark(rank: number): void {
    const index = rank >>> 5;
    this.words[index] = ((this.words[index] ?? 0) | (1 << (rank & 31))) >>> 0;
  }

  *values(): IterableIterator<number> {
    const words = this.words;
    for (let index = 0; index < words.length; index++) {
      let word = words[index] ?? 0;
      while (word !== 0) {
        const lowest = word & -word;
        yield (index << 5) + (31 - Math.clz32(lowest));
        word = (word ^ lowest) >>> 0;
      }
    }
  }
}

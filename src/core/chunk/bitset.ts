/**
 * Fixed-size set of entry indices, one bit per entry point
 */
export class BitSet {
  private readonly words: Uint32Array;

  constructor(public readonly size: number) {
    this.words = new Uint32Array(Math.max(1, Math.ceil(size / 32)));
  }

  setBit(index: number): void {
    this.assertInRange(index);
    this.words[index >>> 5] |= 1 << (index & 31);
  }

  hasBit(index: number): boolean {
    this.assertInRange(index);
    return (this.words[index >>> 5] & (1 << (index & 31))) !== 0;
  }

  /** Stable grouping key, equal for equal sets */
  toKey(): string {
    return Array.from(this.words, word => word.toString(16)).join('.');
  }

  /** Bits in index order, e.g. `101` for entries 0 and 2 */
  toString(): string {
    let result = '';
    for (let i = 0; i < this.size; i++) result += this.hasBit(i) ? '1' : '0';
    return result;
  }

  private assertInRange(index: number) {
    if (index < 0 || index >= this.size) {
      throw new RangeError(`Bit ${index} is out of range for a set of ${this.size}`);
    }
  }
}

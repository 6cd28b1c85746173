/**
 * Disjoint-set forest over dense integer ids
 */
export class DisjointSet {
  private readonly parent: Int32Array;
  private readonly size: Int32Array;

  constructor(readonly count: number) {
    this.parent = new Int32Array(count);
    this.size = new Int32Array(count).fill(1);
    for (let i = 0; i < count; i++) {
      this.parent[i] = i;
    }
  }

  find(x: number): number {
    this.assertIndex(x);
    let node = x;
    while (this.parent[node] !== node) {
      // Path halving
      const grandparent = this.parent[this.parent[node] ?? node] ?? node;
      this.parent[node] = grandparent;
      node = grandparent;
    }
    return node;
  }

  /**
   * Merge the sets holding a and b. Returns false when they were already joined.
   */
  union(a: number, b: number): boolean {
    let rootA = this.find(a);
    let rootB = this.find(b);
    if (rootA === rootB) {
      return false;
    }

    const sizeA = this.size[rootA] ?? 1;
    const sizeB = this.size[rootB] ?? 1;
    if (sizeA < sizeB) {
      [rootA, rootB] = [rootB, rootA];
    }
    this.parent[rootB] = rootA;
    this.size[rootA] = sizeA + sizeB;
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  private assertIndex(x: number): void {
    if (!Number.isInteger(x) || x < 0 || x >= this.count) {
      throw new RangeError(`Index ${x} out of range [0, ${this.count})`);
    }
  }
}

// Nodes created per STIX type tag over a whole run.
export class NodeCounter {
  private readonly counts = new Map<string, number>();

  increment(type: string): void {
    this.counts.set(type, (this.counts.get(type) ?? 0) + 1);
  }

  count(type: string): number {
    return this.counts.get(type) ?? 0;
  }

  entries(): Array<[string, number]> {
    return [...this.counts.entries()].sort(([a], [b]) => a.localeCompare(b));
  }

  get total(): number {
    let sum = 0;
    for (const n of this.counts.values()) {
      sum += n;
    }
    return sum;
  }

  snapshot(): NodeCounter {
    const copy = new NodeCounter();
    for (const [type, n] of this.counts) {
      copy.counts.set(type, n);
    }
    return copy;
  }

  /** Nodes counted since `earlier` was taken; types that did not grow are left out. */
  since(earlier: NodeCounter): NodeCounter {
    const delta = new NodeCounter();
    for (const [type, n] of this.counts) {
      const added = n - earlier.count(type);
      if (added > 0) {
        delta.counts.set(type, added);
      }
    }
    return delta;
  }

  /** `type: n` per type, then `total: N`. */
  summaryLines(): string[] {
    return [...this.entries().map(([type, n]) => `${type}: ${n}`), `total: ${this.total}`];
  }
}

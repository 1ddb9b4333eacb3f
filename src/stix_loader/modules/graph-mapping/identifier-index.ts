import { GraphNodeRef, GraphTransaction } from '../graph-store/graph-store.interface';
import { UnresolvedReferenceError } from '../../core/exception/custom-exceptions';

/**
 * Run-scoped map from STIX id to graph node. Misses fall through to the
 * store's unique-id lookup, so nodes written by an earlier archive entry, or
 * an earlier run against the same database, still resolve.
 */
export class IdentifierIndex {
  private readonly nodes = new Map<string, GraphNodeRef>();

  /** Only call once the transaction that created the node has committed. */
  register(id: string, node: GraphNodeRef): void {
    this.nodes.set(id, node);
  }

  has(id: string): boolean {
    return this.nodes.has(id);
  }

  get size(): number {
    return this.nodes.size;
  }

  async resolve(tx: GraphTransaction, id: string): Promise<GraphNodeRef | null> {
    const cached = this.nodes.get(id);
    if (cached) {
      return cached;
    }
    const found = await tx.findNodeById(id);
    if (found) {
      this.nodes.set(id, found);
    }
    return found;
  }

  async require(tx: GraphTransaction, id: string): Promise<GraphNodeRef> {
    const node = await this.resolve(tx, id);
    if (!node) {
      throw new UnresolvedReferenceError(id);
    }
    return node;
  }
}

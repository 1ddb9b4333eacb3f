import { GraphStore } from '../graph-store/graph-store.interface';
import { IdentifierIndex } from './identifier-index';
import { NodeCounter } from './node-counter';

/** State shared by the builders for one ingestion run. */
export interface MappingContext {
  readonly store: GraphStore;
  readonly index: IdentifierIndex;
  readonly counter: NodeCounter;
  // ids whose node this run created and whose edges are still to be made
  readonly pendingRelations: Set<string>;
}

export function createMappingContext(store: GraphStore): MappingContext {
  return { store, index: new IdentifierIndex(), counter: new NodeCounter(), pendingRelations: new Set() };
}

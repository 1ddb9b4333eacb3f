import { Logger } from '@nestjs/common';
import { GraphStoreError } from '../../core/exception/custom-exceptions';
import {
  GraphEdgeRef,
  GraphNodeRef,
  GraphProperties,
  GraphStore,
  GraphTransaction,
} from './graph-store.interface';

export interface StoredNode {
  elementId: string;
  label: string;
  properties: GraphProperties;
}

export interface StoredEdge {
  elementId: string;
  label: string;
  sourceId: string; // elementId of the source node
  targetId: string;
  properties: GraphProperties;
}

class InMemoryTransaction implements GraphTransaction {
  readonly nodes: StoredNode[] = [];
  readonly edges: StoredEdge[] = [];

  constructor(private readonly store: InMemoryGraphStore) {}

  async findNodeById(id: string): Promise<GraphNodeRef | null> {
    const node = this.nodes.find((n) => n.properties.id === id) ?? this.store.findNode(id);
    return node ? { elementId: node.elementId } : null;
  }

  async createNode(label: string, properties: GraphProperties): Promise<GraphNodeRef> {
    const node: StoredNode = { elementId: this.store.nextElementId('n'), label, properties: { ...properties } };
    this.nodes.push(node);
    return { elementId: node.elementId };
  }

  async createEdge(
    source: GraphNodeRef,
    target: GraphNodeRef,
    label: string,
    properties: GraphProperties,
  ): Promise<GraphEdgeRef> {
    for (const ref of [source, target]) {
      if (!this.hasNode(ref.elementId)) {
        throw new GraphStoreError(`node ${ref.elementId} does not exist`);
      }
    }
    const edge: StoredEdge = {
      elementId: this.store.nextElementId('e'),
      label,
      sourceId: source.elementId,
      targetId: target.elementId,
      properties: { ...properties },
    };
    this.edges.push(edge);
    return { elementId: edge.elementId };
  }

  private hasNode(elementId: string): boolean {
    return this.nodes.some((n) => n.elementId === elementId) || this.store.getNode(elementId) !== undefined;
  }
}

/**
 * Process-local graph store. Used for dry runs (`GRAPH_STORE_DRIVER=memory`)
 * and as the storage stand-in in tests. Writes of a transaction are staged
 * and only become visible once the unit of work resolves.
 */
export class InMemoryGraphStore implements GraphStore {
  private readonly logger = new Logger(InMemoryGraphStore.name);
  private readonly nodesByElementId = new Map<string, StoredNode>();
  private readonly nodesById = new Map<string, StoredNode>();
  private readonly edgeList: StoredEdge[] = [];
  private sequence = 0;
  private location: string | null = null;

  async open(location: string): Promise<void> {
    if (this.location !== null) {
      throw new GraphStoreError(`graph store is already open at ${this.location}`);
    }
    this.location = location;
    this.logger.log(`in-memory graph store opened (${location})`);
  }

  async transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    if (this.location === null) {
      throw new GraphStoreError('graph store is not open');
    }
    const tx = new InMemoryTransaction(this);
    const result = await work(tx);
    for (const node of tx.nodes) {
      this.nodesByElementId.set(node.elementId, node);
      if (typeof node.properties.id === 'string') {
        this.nodesById.set(node.properties.id, node);
      }
    }
    this.edgeList.push(...tx.edges);
    return result;
  }

  async close(): Promise<void> {
    if (this.location !== null) {
      this.logger.log(`in-memory graph store closed: ${this.nodesByElementId.size} nodes, ${this.edgeList.length} edges`);
    }
    this.location = null;
  }

  get isOpen(): boolean {
    return this.location !== null;
  }

  nextElementId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}${this.sequence}`;
  }

  findNode(id: string): StoredNode | undefined {
    return this.nodesById.get(id);
  }

  getNode(elementId: string): StoredNode | undefined {
    return this.nodesByElementId.get(elementId);
  }

  nodes(label?: string): StoredNode[] {
    const all = [...this.nodesByElementId.values()];
    return label === undefined ? all : all.filter((n) => n.label === label);
  }

  edges(label?: string): StoredEdge[] {
    return label === undefined ? [...this.edgeList] : this.edgeList.filter((e) => e.label === label);
  }

  /** Edges with their endpoints expressed as STIX ids, for assertions and reports. */
  edgesBetweenIds(label?: string): Array<{ label: string; from: string; to: string; properties: GraphProperties }> {
    return this.edges(label).map((edge) => ({
      label: edge.label,
      from: this.idOf(edge.sourceId),
      to: this.idOf(edge.targetId),
      properties: edge.properties,
    }));
  }

  private idOf(elementId: string): string {
    const id = this.nodesByElementId.get(elementId)?.properties.id;
    return typeof id === 'string' ? id : elementId;
  }
}

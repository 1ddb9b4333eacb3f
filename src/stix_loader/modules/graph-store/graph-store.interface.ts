export const GRAPH_STORE = 'GRAPH_STORE';

export type GraphPropertyValue = string | number | boolean | string[] | number[] | boolean[];

export type GraphProperties = Record<string, GraphPropertyValue>;

export interface GraphNodeRef {
  readonly elementId: string;
}

export interface GraphEdgeRef {
  readonly elementId: string;
}

/** One unit of work; every call inside it commits or rolls back together. */
export interface GraphTransaction {
  findNodeById(id: string): Promise<GraphNodeRef | null>;
  createNode(label: string, properties: GraphProperties): Promise<GraphNodeRef>;
  createEdge(
    source: GraphNodeRef,
    target: GraphNodeRef,
    label: string,
    properties: GraphProperties,
  ): Promise<GraphEdgeRef>;
}

export interface GraphStore {
  open(location: string): Promise<void>;
  transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

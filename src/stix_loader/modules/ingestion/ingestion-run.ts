import { Logger } from '@nestjs/common';
import { StixObject } from '../../core/types/stix-types';
import { GraphStoreError, IngestionStateError, errorMessage } from '../../core/exception/custom-exceptions';
import { GraphStore } from '../graph-store/graph-store.interface';
import { MappingContext, createMappingContext } from '../graph-mapping/mapping-context';
import { NodesMakerService } from '../graph-mapping/nodes-maker.service';
import { RelationsMakerService } from '../graph-mapping/relations-maker.service';

export type IngestionState = 'idle' | 'node-creation' | 'relation-creation' | 'closed';

const TRANSITIONS: Record<IngestionState, ReadonlyArray<IngestionState>> = {
  idle: ['node-creation', 'closed'],
  'node-creation': ['relation-creation', 'closed'],
  // the next bundle or archive entry starts another node pass
  'relation-creation': ['node-creation', 'closed'],
  closed: [],
};

/**
 * One ingestion run: an open store, the identifier index and node counter
 * shared by every file or entry of the run, and the pass it is in.
 */
export class IngestionRun {
  private readonly logger = new Logger(IngestionRun.name);
  private current: IngestionState = 'idle';
  readonly context: MappingContext;

  private constructor(
    private readonly store: GraphStore,
    private readonly nodesMaker: NodesMakerService,
    private readonly relationsMaker: RelationsMakerService,
  ) {
    this.context = createMappingContext(store);
  }

  static async open(
    store: GraphStore,
    location: string,
    nodesMaker: NodesMakerService,
    relationsMaker: RelationsMakerService,
  ): Promise<IngestionRun> {
    try {
      await store.open(location);
    } catch (error) {
      if (error instanceof GraphStoreError) {
        throw error;
      }
      throw new GraphStoreError(`could not open graph store at ${location}: ${errorMessage(error)}`);
    }
    return new IngestionRun(store, nodesMaker, relationsMaker);
  }

  get state(): IngestionState {
    return this.current;
  }

  beginNodePass(): void {
    this.transition('node-creation');
  }

  beginRelationPass(): void {
    this.transition('relation-creation');
  }

  async createNodes(obj: StixObject): Promise<void> {
    this.expect('node-creation');
    await this.nodesMaker.createNodes(obj, this.context);
  }

  async createRelations(obj: StixObject): Promise<void> {
    this.expect('relation-creation');
    await this.relationsMaker.createRelations(obj, this.context);
  }

  async close(): Promise<void> {
    this.transition('closed');
    await this.store.close();
  }

  private expect(state: IngestionState): void {
    if (this.current !== state) {
      throw new IngestionStateError(`operation requires state ${state}, run is ${this.current}`, {
        expected: state,
        actual: this.current,
      });
    }
  }

  private transition(next: IngestionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new IngestionStateError(`illegal transition ${this.current} -> ${next}`, {
        from: this.current,
        to: next,
      });
    }
    this.logger.debug(`${this.current} -> ${next}`);
    this.current = next;
  }
}

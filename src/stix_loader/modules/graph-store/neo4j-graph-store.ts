import { Logger } from '@nestjs/common';
import neo4j, { Driver, Integer, ManagedTransaction, Session } from 'neo4j-driver';
import retry from 'async-retry';
import { GraphStoreError, errorMessage } from '../../core/exception/custom-exceptions';
import { INTEGER_PROPERTY_NAMES } from '../../core/types/stix-properties';
import {
  GraphEdgeRef,
  GraphNodeRef,
  GraphProperties,
  GraphPropertyValue,
  GraphStore,
  GraphTransaction,
} from './graph-store.interface';

// every STIX node also carries this label so the id lookup can use an index
export const INDEX_LABEL = 'StixNode';

export interface Neo4jGraphStoreOptions {
  username: string;
  password?: string;
  database: string;
  connectRetries: number;
}

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

/** JS numbers reach Neo4j as floats; integer-valued STIX properties are sent as Neo4j integers. */
export function toNeo4jProperties(properties: GraphProperties): Record<string, GraphPropertyValue | Integer> {
  const converted: Record<string, GraphPropertyValue | Integer> = {};
  for (const [key, value] of Object.entries(properties)) {
    converted[key] =
      typeof value === 'number' && Number.isInteger(value) && INTEGER_PROPERTY_NAMES.has(key) ? neo4j.int(value) : value;
  }
  return converted;
}

class Neo4jTransaction implements GraphTransaction {
  constructor(private readonly tx: ManagedTransaction) {}

  async findNodeById(id: string): Promise<GraphNodeRef | null> {
    const result = await this.tx.run<{ elementId: string }>(
      `MATCH (n:${INDEX_LABEL} {id: $id}) RETURN elementId(n) AS elementId LIMIT 1`,
      { id },
    );
    const record = result.records[0];
    return record ? { elementId: record.get('elementId') } : null;
  }

  async createNode(label: string, properties: GraphProperties): Promise<GraphNodeRef> {
    const labels = label === INDEX_LABEL ? INDEX_LABEL : `${INDEX_LABEL}:${quoteIdentifier(label)}`;
    const result = await this.tx.run<{ elementId: string }>(
      `CREATE (n:${labels}) SET n = $properties RETURN elementId(n) AS elementId`,
      { properties: toNeo4jProperties(properties) },
    );
    const record = result.records[0];
    if (!record) {
      throw new GraphStoreError(`node ${label} was not created`);
    }
    return { elementId: record.get('elementId') };
  }

  async createEdge(
    source: GraphNodeRef,
    target: GraphNodeRef,
    label: string,
    properties: GraphProperties,
  ): Promise<GraphEdgeRef> {
    const result = await this.tx.run<{ elementId: string }>(
      `MATCH (s) WHERE elementId(s) = $source
       MATCH (t) WHERE elementId(t) = $target
       CREATE (s)-[r:${quoteIdentifier(label)}]->(t)
       SET r = $properties
       RETURN elementId(r) AS elementId`,
      { source: source.elementId, target: target.elementId, properties: toNeo4jProperties(properties) },
    );
    const record = result.records[0];
    if (!record) {
      throw new GraphStoreError(`relationship ${label} was not created: missing endpoint`);
    }
    return { elementId: record.get('elementId') };
  }
}

export class Neo4jGraphStore implements GraphStore {
  private readonly logger = new Logger(Neo4jGraphStore.name);
  private driver: Driver | null = null;
  private session: Session | null = null;

  constructor(private readonly options: Neo4jGraphStoreOptions) {}

  async open(location: string): Promise<void> {
    if (this.driver) {
      throw new GraphStoreError(`graph store is already open`);
    }
    const driver = neo4j.driver(location, neo4j.auth.basic(this.options.username, this.options.password ?? ''));
    try {
      await retry(
        async () => {
          await driver.verifyConnectivity({ database: this.options.database });
        },
        {
          retries: this.options.connectRetries,
          factor: 2,
          minTimeout: 500,
          maxTimeout: 5000,
          onRetry: (error: unknown, attempt: number) => {
            this.logger.warn(`Retrying connection to ${location} (attempt ${attempt}): ${errorMessage(error)}`);
          },
        },
      );
      const session = driver.session({ database: this.options.database, defaultAccessMode: neo4j.session.WRITE });
      await session.run(
        `CREATE CONSTRAINT stix_node_id IF NOT EXISTS FOR (n:${INDEX_LABEL}) REQUIRE n.id IS UNIQUE`,
      );
      this.driver = driver;
      this.session = session;
      this.logger.log(`connected to ${location} (database ${this.options.database})`);
    } catch (error) {
      await driver.close();
      throw new GraphStoreError(`could not open graph database at ${location}: ${errorMessage(error)}`);
    }
  }

  async transaction<T>(work: (tx: GraphTransaction) => Promise<T>): Promise<T> {
    if (!this.session) {
      throw new GraphStoreError('graph store is not open');
    }
    return this.session.executeWrite((tx) => work(new Neo4jTransaction(tx)));
  }

  async close(): Promise<void> {
    const { session, driver } = this;
    this.session = null;
    this.driver = null;
    if (session) {
      await session.close();
    }
    if (driver) {
      await driver.close();
      this.logger.log('graph database connection closed');
    }
  }
}

import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GRAPH_STORE, GraphStore } from './graph-store.interface';
import { InMemoryGraphStore } from './in-memory-graph-store';
import { Neo4jGraphStore } from './neo4j-graph-store';
import { GRAPH_STORE_CONFIG_KEY, GraphStoreConfig } from '../../config/graph-store.config';

@Global()
@Module({
  providers: [
    {
      provide: GRAPH_STORE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): GraphStore => {
        const config = configService.getOrThrow<GraphStoreConfig>(GRAPH_STORE_CONFIG_KEY);
        if (config.driver === 'memory') {
          return new InMemoryGraphStore();
        }
        return new Neo4jGraphStore({
          username: config.username,
          password: config.password,
          database: config.database,
          connectRetries: config.connectRetries,
        });
      },
    },
  ],
  exports: [GRAPH_STORE],
})
export class GraphStoreModule {}

import { registerAs } from '@nestjs/config';
import * as Joi from 'joi';

export type GraphStoreDriver = 'neo4j' | 'memory';

export interface GraphStoreConfig {
  driver: GraphStoreDriver;
  uri: string;
  username: string;
  password?: string;
  database: string;
  connectRetries: number;
}

export const GRAPH_STORE_CONFIG_KEY = 'graphStore';

export default registerAs(GRAPH_STORE_CONFIG_KEY, (): GraphStoreConfig => ({
  driver: process.env.GRAPH_STORE_DRIVER === 'memory' ? 'memory' : 'neo4j',
  uri: process.env.NEO4J_URI || 'bolt://localhost:7687',
  username: process.env.NEO4J_USERNAME || 'neo4j',
  password: process.env.NEO4J_PASSWORD,
  database: process.env.NEO4J_DATABASE || 'neo4j',
  connectRetries: parseInt(process.env.NEO4J_CONNECT_RETRIES || '3', 10),
}));

export const graphStoreConfigSchema = Joi.object({
  GRAPH_STORE_DRIVER: Joi.string().valid('neo4j', 'memory').default('neo4j'),
  NEO4J_URI: Joi.string().uri({ scheme: ['bolt', 'bolt+s', 'bolt+ssc', 'neo4j', 'neo4j+s', 'neo4j+ssc'] }).default('bolt://localhost:7687'),
  NEO4J_USERNAME: Joi.string().default('neo4j'),
  NEO4J_PASSWORD: Joi.string().optional(),
  NEO4J_DATABASE: Joi.string().default('neo4j'),
  NEO4J_CONNECT_RETRIES: Joi.number().integer().min(0).default(3),
});

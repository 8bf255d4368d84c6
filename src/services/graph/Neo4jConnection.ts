/**
 * Neo4j Connection
 *
 * Bolt driver wrapper implementing the GraphStore contract. The driver is created
 * lazily on first use; each transaction gets its own write session.
 */

import neo4j, { Driver, Session, Transaction } from 'neo4j-driver';
import { Logger } from '../core/Logger';
import { PropertyValue, QueryParams } from '../../types/GraphTypes';
import { GraphStore, GraphTransaction } from './IGraphStore';

const logger = new Logger('Neo4jConnection');

export const DEFAULT_NEO4J_PORT = 7687;
export const DEFAULT_NEO4J_DATABASE = 'neo4j';

/**
 * Neo4j connection configuration
 */
export interface Neo4jConnectionConfig {
  scheme: string; // neo4j, bolt, neo4j+s, ...
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export function buildConnectionUri(config: Pick<Neo4jConnectionConfig, 'scheme' | 'host' | 'port'>): string {
  return `${config.scheme}://${config.host}:${config.port}`;
}

function isSafeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value);
}

/**
 * JavaScript numbers reach Neo4j as floats. Whole numbers are sent as Neo4j
 * integers so `5` in the description is stored as `5`, not `5.0`.
 *
 * Neo4j lists hold a single type, so a list is converted only when every element
 * is a whole number; `[1.5, 2, 2.5]` stays a list of floats.
 */
function toNeo4jValue(value: PropertyValue): unknown {
  if (Array.isArray(value)) {
    return value.length > 0 && value.every(isSafeInteger) ? value.map((item) => neo4j.int(item)) : value;
  }
  if (isSafeInteger(value)) {
    return neo4j.int(value);
  }
  return value;
}

export function toNeo4jParams(params: QueryParams): Record<string, unknown> {
  const converted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    converted[key] = toNeo4jValue(value);
  }
  return converted;
}

class Neo4jTransaction implements GraphTransaction {
  constructor(
    private readonly session: Session,
    private readonly tx: Transaction
  ) {}

  async execute(statement: string, params: QueryParams): Promise<void> {
    await this.tx.run(statement, toNeo4jParams(params));
  }

  async commit(): Promise<void> {
    await this.tx.commit();
  }

  async rollback(): Promise<void> {
    if (this.tx.isOpen()) {
      await this.tx.rollback();
    }
  }

  async close(): Promise<void> {
    await this.session.close();
  }
}

/**
 * Neo4j-backed graph store
 */
export class Neo4jGraphStore implements GraphStore {
  private driver: Driver | null = null;

  constructor(private readonly config: Neo4jConnectionConfig) {}

  /**
   * Create the driver if needed
   */
  connect(): Driver {
    if (this.driver) {
      return this.driver;
    }

    const uri = buildConnectionUri(this.config);
    logger.info('Connecting to Neo4j', { uri, database: this.config.database, user: this.config.user });

    this.driver = neo4j.driver(uri, neo4j.auth.basic(this.config.user, this.config.password));
    return this.driver;
  }

  async beginTransaction(): Promise<GraphTransaction> {
    const driver = this.connect();
    const session = driver.session({
      database: this.config.database,
      defaultAccessMode: neo4j.session.WRITE,
    });

    try {
      const tx = session.beginTransaction();
      logger.debug('Transaction opened', { database: this.config.database });
      return new Neo4jTransaction(session, tx);
    } catch (error) {
      await session.close();
      throw error;
    }
  }

  /**
   * Health check - verify the server is reachable with the configured credentials
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.connect().verifyConnectivity({ database: this.config.database });
      logger.debug('Neo4j health check passed');
      return true;
    } catch (error) {
      logger.error('Neo4j health check failed', { error });
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.driver) {
      try {
        await this.driver.close();
        logger.info('Neo4j connection closed');
      } finally {
        this.driver = null;
      }
    }
  }
}
